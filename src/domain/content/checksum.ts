import { createHash } from "node:crypto";

const SHA256_HEX = /^[0-9a-f]{64}$/;

export const sha256Hex = (data: Uint8Array | string): string =>
  createHash("sha256").update(data).digest("hex");

export const normalizeChecksum = (value: string): string =>
  value.trim().toLowerCase();

export const isSha256Hex = (value: string): boolean => SHA256_HEX.test(value);
