/**
 * Stack module
 *
 * Discovery of stacks/<name>/ directories and loading of their manifests
 * and compose templates.
 */

export type {
  BuiltinFragmentName,
  RawEnvTree,
  StackServiceFile,
  StackFragmentFile,
  StackManifestFile,
  StackSource,
  StackService,
  StackManifest,
} from "./types";
export { BUILTIN_FRAGMENT_NAMES, DEFAULT_SERVICE_FRAGMENTS } from "./types";

export { getStacksDir, discoverStacks } from "./discover";

export {
  STACK_MANIFEST_SCHEMA_FILE,
  validateStackManifestShape,
  parseStackManifest,
  loadStackManifest,
  collectServiceDescriptors,
} from "./manifest";

export type { ComposeDocument } from "./compose-template";
export { parseComposeDocument, loadComposeTemplate, loadComposeTemplateFile } from "./compose-template";
