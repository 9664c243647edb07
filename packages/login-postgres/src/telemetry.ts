import {
  createReloginCounter,
  createReloginHistogram,
  createReloginLogger,
  getReloginTracer,
  type ReloginInstrumentationOptions,
  type ReloginLogger,
  type ReloginTracer,
} from "@relogin/telemetry";
import type { Counter, Histogram } from "@opentelemetry/api";

export interface PostgresTelemetryMetrics {
  readonly queryCounter: Counter;
  readonly queryDuration: Histogram;
  readonly transactionCounter: Counter;
  readonly transactionDuration: Histogram;
}

export interface PostgresTelemetryOptions {
  readonly instrumentation?: ReloginInstrumentationOptions;
  readonly tracer?: ReloginTracer;
  readonly logger?: ReloginLogger;
}

export interface PostgresTelemetryContext {
  readonly tracer: ReloginTracer;
  readonly logger: ReloginLogger;
  readonly metrics: PostgresTelemetryMetrics;
}

export const createPostgresTelemetry = (options: PostgresTelemetryOptions = {}): PostgresTelemetryContext => {
  const instrumentation: ReloginInstrumentationOptions = {
    name: "login-postgres",
    ...options.instrumentation,
  };

  return {
    tracer: options.tracer ?? getReloginTracer(instrumentation),
    logger: options.logger ?? createReloginLogger({ name: instrumentation.name }),
    metrics: {
      queryCounter: createReloginCounter("relogin_postgres_queries_total", {
        description: "Count of login table queries.",
        instrumentation,
      }),
      queryDuration: createReloginHistogram("relogin_postgres_query_duration_ms", {
        description: "Duration of login table queries.",
        unit: "ms",
        instrumentation,
      }),
      transactionCounter: createReloginCounter("relogin_postgres_transactions_total", {
        description: "Count of login store transactions.",
        instrumentation,
      }),
      transactionDuration: createReloginHistogram("relogin_postgres_transaction_duration_ms", {
        description: "Duration of login store transactions.",
        unit: "ms",
        instrumentation,
      }),
    },
  } satisfies PostgresTelemetryContext;
};
