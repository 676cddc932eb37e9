/**
 * Graph Compiler: Type Definitions
 */

import type { ResourceDescriptor } from "../core/builder.js";
import type { ArmExpression, SecureParameter } from "../core/expression.js";
import type { Location } from "../core/types.js";
import type { Logger } from "../logging/index.js";
import type { PostDeployAction } from "../postdeploy/types.js";

export type CompilerOptions = {
  /** Location every resource is deployed to. */
  location: Location;
  /** Default tenant for resources that need one. Default: `subscription().tenantId`. */
  tenantId?: ArmExpression;
  logger?: Logger;
};

export type CompilationResult = {
  location: Location;
  /** Every descriptor, in builder order. */
  descriptors: readonly ResourceDescriptor[];
  /** Unique secure parameters, first declaration wins. */
  secretManifest: readonly SecureParameter[];
  /** Post-deploy actions in declaration order. */
  postDeployQueue: readonly PostDeployAction[];
};
