import { createHash, createHmac } from "crypto";
import { SignJWT, type JWTPayload } from "jose";
import { v4 as uuidv4 } from "uuid";
import type { Credentials, HttpMethod } from "../types";
import { ConfigurationError } from "../config/errors";

export const JWT_LIFETIME_SECONDS = 3600;

/**
 * Signs a short-lived HS256 token for bearer authentication. The subject is
 * the API key; the issuer is only set when the account has one.
 */
export async function generateJwt(
  credentials: Credentials,
  claims: JWTPayload = {},
  now: Date = new Date()
): Promise<string> {
  if (!credentials.secretKey) {
    throw new ConfigurationError("JWT authentication requires a secret key");
  }

  const issuedAt = Math.floor(now.getTime() / 1000);
  const jti = createHash("sha256")
    .update(`${now.getTime()}:${uuidv4()}`)
    .digest("hex");

  const token = new SignJWT({ ...claims })
    .setProtectedHeader({ alg: "HS256", typ: "JWT" })
    .setSubject(credentials.apiKey)
    .setIssuedAt(issuedAt)
    .setExpirationTime(issuedAt + JWT_LIFETIME_SECONDS)
    .setJti(jti);

  if (credentials.iss) {
    token.setIssuer(credentials.iss);
  }

  return token.sign(new TextEncoder().encode(credentials.secretKey));
}

/**
 * Request signature in the form `<unix seconds>.<hex digest>`, where the
 * digest is HMAC-SHA256 over `METHOD\npath\ntimestamp\nbody`.
 */
export function generateHmacSignature(
  secretKey: string,
  method: HttpMethod,
  path: string,
  body: string = "",
  now: Date = new Date()
): string {
  const timestamp = String(Math.floor(now.getTime() / 1000));
  const message = `${method}\n${path}\n${timestamp}\n${body}`;
  const signature = createHmac("sha256", secretKey)
    .update(message, "utf8")
    .digest("hex");
  return `${timestamp}.${signature}`;
}
