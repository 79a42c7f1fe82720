/**
 * Artifact output module
 */

export type { CompiledArtifact, WriteArtifactsOptions, WriteArtifactsResult } from "./writer";
export {
  DEFAULT_ARTIFACT_MODE,
  PRIVATE_ARTIFACT_MODE,
  hashContent,
  createArtifact,
  readExistingHash,
  systemErrorCode,
  writeFileAtomic,
  writeArtifacts,
} from "./writer";
export { encodeDotenvEntry, serializeDotenv } from "./dotenv";
