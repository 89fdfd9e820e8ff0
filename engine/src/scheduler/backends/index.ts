export { IntervalBackend, type IntervalBackendOptions } from "./interval.js";
export { ProcessSignalBackend, type ProcessSignalBackendOptions } from "./process-signal.js";
