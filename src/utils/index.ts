export { Logger } from "./Logger";
export { writeFileAtomic, readFileIfExists, removeFileIfExists } from "./AtomicFile";
export { renderCsv, parseCsv, parseCsvRows } from "./Csv";
export type { CsvRow } from "./Csv";
export { Throttle, withRetry, sleep, DEFAULT_DELAYS } from "./Throttle";
export type { Sleeper, ThrottleDelays, RetryOptions } from "./Throttle";
