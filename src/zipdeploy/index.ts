export {
  type ZipDeployArtifact,
  classifyArtifact,
  archivePathFor,
  materializeArtifact,
  resolveZipPath,
} from "./artifact.js";
