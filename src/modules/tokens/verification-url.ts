// src/modules/tokens/verification-url.ts
// Baut den extern erreichbaren Verifikations-Link: <base>?token=<token>

import type { VerificationUrlBuilder } from "./types.js";

export function createVerificationUrlBuilder(baseUrl: string): VerificationUrlBuilder {
  // wirft früh bei kaputter Konfiguration, nicht erst beim ersten Request
  const base = new URL(baseUrl);

  return (token: string) => {
    const url = new URL(base);
    url.searchParams.set("token", token);
    return url.toString();
  };
}
