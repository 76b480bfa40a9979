export { LogLevel, logger, parseLogLevel, shouldLog } from "./logger";
export type { LogRecord, LogSink, Logger } from "./logger";
export { sleep } from "./sleep";
export { onShutdownSignal, runIntervalLoop } from "./worker";
export type { IntervalLoopOptions } from "./worker";
