/**
 * bind_address parsing
 *
 * Accepts `host:port`, `[ipv6]:port` or a bare `port`.
 */

import { ConfigParseError } from "@keyhop/core";

export interface BindAddress {
  /** Undefined means every interface */
  host?: string;
  port: number;
}

export function parseBindAddress(address: string): BindAddress {
  const trimmed = address.trim();

  const bracketed = trimmed.match(/^\[([^\]]+)\]:(\d+)$/);
  if (bracketed) {
    return { host: bracketed[1], port: parsePort(bracketed[2], address) };
  }

  if (/^\d+$/.test(trimmed)) {
    return { port: parsePort(trimmed, address) };
  }

  const separator = trimmed.lastIndexOf(":");
  const host = trimmed.slice(0, separator);
  if (separator <= 0 || host.includes(":")) {
    throw new ConfigParseError(`Invalid bind_address "${address}"; expected host:port`);
  }
  return { host, port: parsePort(trimmed.slice(separator + 1), address) };
}

function parsePort(value: string, address: string): number {
  const port = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(port) || port > 65535) {
    throw new ConfigParseError(`Invalid port in bind_address "${address}"`);
  }
  return port;
}
