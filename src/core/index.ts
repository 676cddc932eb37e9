export {
  type JsonPrimitive,
  type JsonValue,
  type JsonObject,
  type ResourceName,
  type Location,
  type FeatureFlag,
  isResourceName,
  resourceName,
  childResourceName,
  armLocation,
  featureFlagValue,
} from "./types.js";

export {
  type ArmExpression,
  type SecureParameter,
  armExpression,
  evalExpression,
  isGuid,
  guidExpression,
  SUBSCRIPTION_TENANT_ID,
  secureParameter,
  parameterReference,
} from "./expression.js";

export {
  type ResourceDescriptor,
  type PeerContext,
  type ResourceBuilder,
  descriptorType,
  freezeDescriptor,
} from "./builder.js";

export {
  type ArmGraphErrorCode,
  type ArmGraphErrorOptions,
  ArmGraphError,
  ConfigurationError,
  ArtifactClassificationError,
  CompilationError,
  DeploymentError,
  OperationCancelledError,
  isArmGraphError,
  formatError,
} from "./errors.js";
