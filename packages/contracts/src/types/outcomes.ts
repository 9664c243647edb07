import type { Login } from "./login.js";

export type NotAuthenticatedReason = "no_cookie" | "invalid_cookie" | "no_login";

export type CompromiseTrigger = "token_mismatch" | "concurrent_rotation";

export type AuthenticationOutcome =
  | {
      readonly kind: "authenticated";
      readonly via: "session";
      readonly currentUser: unknown;
    }
  | {
      readonly kind: "authenticated";
      readonly via: "cookie";
      readonly currentUser: unknown;
      readonly login: Login;
    }
  | {
      readonly kind: "not_authenticated";
      readonly reason: NotAuthenticatedReason;
    }
  | {
      readonly kind: "compromised";
      readonly username: string;
      readonly serial: string;
      readonly trigger: CompromiseTrigger;
      readonly revokedLogins: number;
    };

export type LogoutOutcome =
  | { readonly kind: "logged_out"; readonly login: Login }
  | { readonly kind: "no_login"; readonly reason: NotAuthenticatedReason };
