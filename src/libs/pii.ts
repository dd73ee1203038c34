import { createHash } from "node:crypto";

export function sha256(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

// Log-Felder: E-Mail und IP nie im Klartext
export function hashEmailForLog(email: string): string {
  return sha256(email.trim().toLowerCase()).slice(0, 16);
}

export function hashIpForLog(ip: string | null | undefined): string | null {
  if (!ip) return null;
  return sha256(ip.trim()).slice(0, 16);
}
