/**
 * Resource Graph Compiler
 *
 * Walks finalized builder configurations in order and produces:
 * - the flattened descriptor list
 * - the secure parameter manifest (deduplicated by name)
 * - the post-deploy action queue
 *
 * ARM orders resources itself from each descriptor's `dependsOn`, so no
 * topological sort happens here.
 */

import type { PeerContext, ResourceBuilder, ResourceDescriptor } from "../core/builder.js";
import { descriptorType } from "../core/builder.js";
import { CompilationError, ConfigurationError } from "../core/errors.js";
import type { ArmExpression, SecureParameter } from "../core/expression.js";
import { SUBSCRIPTION_TENANT_ID } from "../core/expression.js";
import type { Location, ResourceName } from "../core/types.js";
import type { Logger } from "../logging/index.js";
import { getLogger } from "../logging/index.js";
import type { PostDeployAction } from "../postdeploy/types.js";
import type { CompilationResult, CompilerOptions } from "./types.js";

// =============================================================================
// Peer Context
// =============================================================================

class BatchPeerContext implements PeerContext {
  readonly tenantId: ArmExpression;
  private readonly emitted: ResourceDescriptor[] = [];

  constructor(tenantId: ArmExpression) {
    this.tenantId = tenantId;
  }

  get resources(): readonly ResourceDescriptor[] {
    return [...this.emitted];
  }

  has(name: ResourceName, resourceType?: string): boolean {
    return this.emitted.some(
      (d) => d.name === name && (resourceType === undefined || descriptorType(d) === resourceType),
    );
  }

  record(descriptors: readonly ResourceDescriptor[]): void {
    this.emitted.push(...descriptors);
  }
}

// =============================================================================
// Graph Compiler
// =============================================================================

export class GraphCompiler {
  private location: Location;
  private tenantId: ArmExpression;
  private log: Logger;

  constructor(options: CompilerOptions) {
    this.location = options.location;
    this.tenantId = options.tenantId ?? SUBSCRIPTION_TENANT_ID;
    this.log = options.logger ?? getLogger("compiler");
  }

  /**
   * Compile a batch of builders. Either every builder compiles or a
   * {@link CompilationError} is thrown and nothing is returned. A resource
   * name and type pair emitted twice is a compilation error.
   */
  compile(builders: readonly ResourceBuilder[]): CompilationResult {
    const peers = new BatchPeerContext(this.tenantId);
    const manifest = new Map<string, SecureParameter>();
    const postDeployQueue: PostDeployAction[] = [];

    for (const builder of builders) {
      const name = builder.dependencyName();

      let descriptors: readonly ResourceDescriptor[];
      try {
        descriptors = builder.build(this.location, peers);
      } catch (err) {
        throw new CompilationError(name, { cause: err });
      }
      for (const descriptor of descriptors) {
        const type = descriptorType(descriptor);
        if (peers.has(descriptor.name, type)) {
          throw new CompilationError(name, {
            cause: new ConfigurationError(
              `Resource "${descriptor.name}" (${type ?? "unknown type"}) is declared more than once`,
              { context: { resourceName: descriptor.name, resourceType: type } },
            ),
          });
        }
        peers.record([descriptor]);
      }

      for (const parameter of builder.secureParameters?.() ?? []) {
        if (!manifest.has(parameter.name)) manifest.set(parameter.name, parameter);
      }
      postDeployQueue.push(...(builder.postDeployActions?.() ?? []));

      this.log.debug(`Compiled ${name}`, { descriptors: descriptors.map((d) => d.name) });
    }

    const descriptors = peers.resources;
    this.log.info(`Compiled ${builders.length} configurations into ${descriptors.length} resources`, {
      secureParameters: manifest.size,
      postDeployActions: postDeployQueue.length,
    });

    return {
      location: this.location,
      descriptors,
      secretManifest: [...manifest.values()],
      postDeployQueue,
    };
  }
}

/** Create a graph compiler. */
export function createGraphCompiler(options: CompilerOptions): GraphCompiler {
  return new GraphCompiler(options);
}

/**
 * Compile a batch of builders in one call.
 */
export function compile(builders: readonly ResourceBuilder[], options: CompilerOptions): CompilationResult {
  return new GraphCompiler(options).compile(builders);
}
