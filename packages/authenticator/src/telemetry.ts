import type { Counter } from "@opentelemetry/api";

import {
  createReloginCounter,
  createReloginLogger,
  getReloginTracer,
  type ReloginLogger,
  type ReloginTracer,
} from "@relogin/telemetry";

export interface AuthenticatorTelemetry {
  readonly tracer: ReloginTracer;
  readonly logger: ReloginLogger;
  readonly authentications: Counter;
  readonly revokedLogins: Counter;
}

const instrumentation = { name: "authenticator" } as const;

export const createAuthenticatorTelemetry = (logger?: ReloginLogger): AuthenticatorTelemetry => ({
  tracer: getReloginTracer(instrumentation),
  logger: logger ?? createReloginLogger({ name: instrumentation.name }),
  authentications: createReloginCounter("relogin_authentications_total", {
    description: "Authentication attempts by outcome.",
    instrumentation,
  }),
  revokedLogins: createReloginCounter("relogin_revoked_logins_total", {
    description: "Logins deleted because their cookie was replayed.",
    instrumentation,
  }),
});
