import { createHash } from "node:crypto";
import { AppError } from "../../infra/app-error.js";

export function mapTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export function toNumber(value: unknown, field: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new AppError(500, "persistence_mapping_error", `Unable to map numeric field '${field}'.`);
  }
  return parsed;
}

export function toJsonObject(value: unknown, field: string): Record<string, unknown> | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "object" && !Array.isArray(value)) {
    return { ...value };
  }
  throw new AppError(500, "persistence_mapping_error", `Unable to map JSON field '${field}'.`);
}

export function advisoryLockId(scope: string, key: string): bigint {
  const digest = createHash("sha256").update(`${scope}:${key}`).digest();
  return digest.readBigInt64BE(0);
}
