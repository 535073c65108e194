import fs from "fs";
import tls from "tls";
import { X509Certificate } from "crypto";
import { ConfigError, errorMessage } from "./errors";
import type { TlsConfig } from "./types";

/**
 * Options accepted by both `https.Agent` and the `ws` client.
 */
export type TlsOptions = {
  rejectUnauthorized: boolean;
  cert?: Buffer;
  key?: Buffer;
  ca?: Buffer;
};

function readMaterial(file: string, what: string): Buffer {
  try {
    return fs.readFileSync(file);
  } catch (err) {
    throw new ConfigError(`failed to read ${what}: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Loads client certificate, key and CA bundle. Throws ConfigError on anything unusable,
 * so no connection is attempted with half-loaded material.
 */
export function buildTlsOptions(config: TlsConfig): TlsOptions {
  const options: TlsOptions = {
    rejectUnauthorized: !config.insecureSkipVerify,
  };

  // mTLS needs both halves; one alone is ignored.
  if (config.certFile && config.keyFile) {
    const cert = readMaterial(config.certFile, "client certificate");
    const key = readMaterial(config.keyFile, "client key");
    try {
      tls.createSecureContext({ cert, key });
    } catch (err) {
      throw new ConfigError(`failed to load client certificate: ${errorMessage(err)}`, { cause: err });
    }
    options.cert = cert;
    options.key = key;
  }

  if (config.caFile) {
    const ca = readMaterial(config.caFile, "CA certificate");
    try {
      new X509Certificate(ca);
    } catch (err) {
      throw new ConfigError("failed to parse CA certificate", { cause: err });
    }
    options.ca = ca;
  }

  return options;
}

/**
 * A request-level TLS config replaces the profile-level one entirely.
 */
export function mergeTlsConfig(profileTls?: TlsConfig, requestTls?: TlsConfig): TlsConfig | undefined {
  return requestTls ?? profileTls;
}
