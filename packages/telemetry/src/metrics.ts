import {
  metrics,
  type Counter,
  type Histogram,
  type Meter,
  type MetricOptions,
} from "@opentelemetry/api";

export interface ReloginInstrumentationOptions {
  readonly name?: string;
  readonly version?: string;
  readonly schemaUrl?: string;
}

const DEFAULT_INSTRUMENTATION_NAME = "relogin";

export const getReloginMeter = (options: ReloginInstrumentationOptions = {}): Meter => {
  return metrics.getMeter(options.name ?? DEFAULT_INSTRUMENTATION_NAME, options.version, {
    schemaUrl: options.schemaUrl,
  });
};

export interface ReloginMetricOptions extends MetricOptions {
  readonly instrumentation?: ReloginInstrumentationOptions;
}

export const createReloginCounter = (name: string, options: ReloginMetricOptions = {}): Counter => {
  const { instrumentation, ...counterOptions } = options;
  return getReloginMeter(instrumentation).createCounter(name, counterOptions);
};

export const createReloginHistogram = (name: string, options: ReloginMetricOptions = {}): Histogram => {
  const { instrumentation, ...histogramOptions } = options;
  return getReloginMeter(instrumentation).createHistogram(name, histogramOptions);
};
