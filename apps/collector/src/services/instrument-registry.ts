/**
 * Instrument Registry
 *
 * - Tracks active instruments and the reverse side-handle map
 * - An instrument is persisted before it becomes visible
 * - Expiry removes it from tracking in one synchronous step, then marks it resolved
 */

import { okAsync, type ResultAsync } from "neverthrow";
import { isExpiryDue } from "@updown-recorder/core";
import type { EpochSec, Instrument, OutcomeSide, SideHandle, SideHandles, WindowClass } from "@updown-recorder/core";
import type { InstrumentRepository, RepositoryError } from "@updown-recorder/repositories";

export type RegistryError = { type: "STORAGE_ERROR"; message: string; cause: RepositoryError };

function toRegistryError(cause: RepositoryError): RegistryError {
  return { type: "STORAGE_ERROR", message: cause.message, cause };
}

export interface RegisterInput {
  id: string;
  handles: SideHandles;
  openTs: EpochSec;
  closeTs: EpochSec;
  windowClass: WindowClass;
}

export interface HandleRef {
  instrumentId: string;
  side: OutcomeSide;
}

export class InstrumentRegistry {
  private readonly instruments = new Map<string, Instrument>();
  private readonly handles = new Map<SideHandle, HandleRef>();
  private readonly pending = new Set<string>();

  constructor(
    private readonly repository: InstrumentRepository,
    private readonly expiryGraceSec: number,
  ) {}

  /**
   * Resolves to `false` when the id is already tracked or being registered.
   * On a storage failure nothing is tracked.
   */
  register(input: RegisterInput): ResultAsync<boolean, RegistryError> {
    if (this.instruments.has(input.id) || this.pending.has(input.id)) {
      return okAsync(false);
    }

    this.pending.add(input.id);
    const instrument: Instrument = { ...input, resolved: false };

    return this.repository
      .insertInstrument(instrument)
      .map(() => {
        this.pending.delete(input.id);
        this.track(instrument);
        return true;
      })
      .mapErr(error => {
        this.pending.delete(input.id);
        return toRegistryError(error);
      });
  }

  lookup(instrumentId: string): Instrument | undefined {
    return this.instruments.get(instrumentId);
  }

  isTracked(instrumentId: string): boolean {
    return this.instruments.has(instrumentId) || this.pending.has(instrumentId);
  }

  resolveHandle(handle: SideHandle): HandleRef | undefined {
    return this.handles.get(handle);
  }

  activeInstruments(windowClass?: WindowClass): Instrument[] {
    const all = [...this.instruments.values()];
    return windowClass === undefined ? all : all.filter(i => i.windowClass === windowClass);
  }

  activeHandles(): Set<SideHandle> {
    return new Set(this.handles.keys());
  }

  dueForExpiry(windowClass: WindowClass, nowSec: EpochSec): Instrument[] {
    return this.activeInstruments(windowClass).filter(i => isExpiryDue(i.closeTs, nowSec, this.expiryGraceSec));
  }

  /**
   * `ok(null)` when the id is not tracked. A failed resolved-mark is an error,
   * but the instrument stays removed.
   */
  expire(instrumentId: string): ResultAsync<Instrument | null, RegistryError> {
    const instrument = this.instruments.get(instrumentId);
    if (!instrument) {
      return okAsync(null);
    }

    this.instruments.delete(instrumentId);
    this.handles.delete(instrument.handles.yes);
    this.handles.delete(instrument.handles.no);

    return this.repository
      .markResolved(instrumentId)
      .map(() => ({ ...instrument, resolved: true }))
      .mapErr(toRegistryError);
  }

  size(): number {
    return this.instruments.size;
  }

  private track(instrument: Instrument): void {
    this.instruments.set(instrument.id, instrument);
    this.handles.set(instrument.handles.yes, { instrumentId: instrument.id, side: "yes" });
    this.handles.set(instrument.handles.no, { instrumentId: instrument.id, side: "no" });
  }
}
