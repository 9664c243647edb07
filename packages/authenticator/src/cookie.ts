import { randomBytes, timingSafeEqual } from "node:crypto";

import { err, ok, type DomainError, type Login, type Result } from "@relogin/contracts";

export type AuthCookie = Pick<Login, "username" | "serial" | "token">;

/** Bytes of entropy in a generated serial or token. */
export const SECRET_BYTES = 48;

/** Standard or url-safe alphabet, padding optional. */
const BASE64 = /^[A-Za-z0-9+/_-]+={0,2}$/;
const utf8 = new TextDecoder("utf-8", { fatal: true });

const malformed = (reason: string): Result<never, DomainError> =>
  err({ code: "auth_cookie.malformed", message: "The auth cookie is malformed.", details: { reason } });

const decodeUsername = (field: string): Buffer | undefined =>
  BASE64.test(field) ? Buffer.from(field, "base64") : undefined;

export const generateSecret = (): string => randomBytes(SECRET_BYTES).toString("base64url");

export const encodeAuthCookie = ({ username, serial, token }: AuthCookie): string =>
  `${Buffer.from(username, "utf8").toString("base64url")}.${serial}.${token}`;

/**
 * Serial and token are opaque; only the username field is decoded, and it
 * must decode to non-empty UTF-8.
 */
export const parseAuthCookie = (value: string): Result<AuthCookie, DomainError> => {
  const fields = value.split(".");
  if (fields.length !== 3) {
    return malformed("field_count");
  }
  const [encodedUsername, serial, token] = fields;
  if (!encodedUsername || !serial || !token) {
    return malformed("empty_field");
  }

  const usernameBytes = decodeUsername(encodedUsername);
  if (!usernameBytes) {
    return malformed("encoding");
  }
  let username: string;
  try {
    username = utf8.decode(usernameBytes);
  } catch {
    return malformed("username_encoding");
  }
  if (username.length === 0) {
    return malformed("empty_username");
  }

  return ok({ username, serial, token });
};

/** Compares two tokens in constant time for equal-length inputs. */
export const tokensMatch = (expected: string, presented: string): boolean => {
  const left = Buffer.from(expected, "utf8");
  const right = Buffer.from(presented, "utf8");
  return left.length === right.length && timingSafeEqual(left, right);
};
