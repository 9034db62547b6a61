/**
 * Container image definition.
 */

export {
  CopyInstructionSchema,
  WsgiServerSchema,
  DockerImageSpecObject,
  DockerImageSpecSchema,
  DockerImageOverridesSchema,
  type CopyInstruction,
  type WsgiServer,
  type DockerImageSpec,
  type DockerImageOverrides,
} from "./schema.js";

export { renderDockerfile, buildServerCommand, DockerSpecError } from "./dockerfile.js";
