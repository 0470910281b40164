/**
 * @mintsplit/node — HTTP service for voucher redemption and equity.
 *
 * @packageDocumentation
 */

export { MintsplitService } from "./services/mintsplit-service.js";
export type {
  MintsplitServiceConfig,
  PayeeConfig,
  AssetView,
} from "./services/mintsplit-service.js";
export {
  ROTATION_PRIMARY_TYPE,
  ROTATION_TYPES,
  AttestationError,
  rotationMessage,
  verifyRotationAttestation,
} from "./services/rotation-attestation.js";
export type { AttestationErrorCode, RotationClaim } from "./services/rotation-attestation.js";
export {
  loadConfig,
  loadEquityFile,
  parseEquityFile,
  ConfigSchema,
  EquityFileSchema,
  AddressSchema,
} from "./config.js";
export type { AppConfig, EquityFile } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { serviceConfigFrom } from "./bootstrap.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
