/**
 * @ledgerproof/node — HTTP service for transaction verification.
 *
 * Library entry: everything needed to embed the service without
 * starting a server. `main.ts` is the executable.
 */

export { VerificationService } from "./services/verification-service.js";
export type {
  VerificationServiceConfig,
  LedgerInfo,
  BatchVerificationResult,
  BatchVerificationOptions,
} from "./services/verification-service.js";
export { createCollaborators } from "./services/collaborators.js";
export type { Collaborators, CollaboratorHooks } from "./services/collaborators.js";
export { loadConfig, hasChainLedger, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
