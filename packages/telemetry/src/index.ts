export type { ReloginInstrumentationOptions, ReloginMetricOptions } from "./metrics.js";
export { getReloginMeter, createReloginCounter, createReloginHistogram } from "./metrics.js";

export type { ReloginLogger, ReloginLoggerOptions, ReloginLogLevel, ReloginLogSink } from "./logging.js";
export { createReloginLogger, describeError } from "./logging.js";

export type { ReloginTracer, RunWithSpanOptions } from "./tracing.js";
export { getReloginTracer, runWithSpan, SpanStatusCode } from "./tracing.js";
