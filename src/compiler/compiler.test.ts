import { describe, it, expect } from "vitest";
import type { ResourceBuilder } from "../core/builder.js";
import { CompilationError } from "../core/errors.js";
import { guidExpression } from "../core/expression.js";
import { resourceName } from "../core/types.js";
import { createKeyVault, createSecret } from "../keyvault/index.js";
import { MemoryTransport, SubsystemLogger } from "../logging/index.js";
import { Skus, createServicePlan, createWebApp, secureSetting } from "../webapp/index.js";
import { GraphCompiler, compile, createGraphCompiler } from "./compiler.js";

function quietLogger(transport = new MemoryTransport()) {
  return new SubsystemLogger("test", { level: "debug", transports: [transport] });
}

function failingBuilder(name: string): ResourceBuilder {
  return {
    dependencyName: () => resourceName(name),
    build: () => {
      throw new Error("boom");
    },
  };
}

describe("GraphCompiler", () => {
  it("creates via factory", () => {
    const compiler = createGraphCompiler({ location: "westeurope", logger: quietLogger() });
    expect(compiler).toBeInstanceOf(GraphCompiler);
  });

  it("returns an empty result for an empty batch", () => {
    const result = compile([], { location: "westeurope", logger: quietLogger() });
    expect(result.location).toBe("westeurope");
    expect(result.descriptors).toEqual([]);
    expect(result.secretManifest).toEqual([]);
    expect(result.postDeployQueue).toEqual([]);
  });

  it("flattens descriptors in builder order", () => {
    const result = compile(
      [createWebApp({ name: "shop" }), createKeyVault({ name: "shop-vault" })],
      { location: "West Europe", logger: quietLogger() },
    );
    expect(result.descriptors.map((d) => d.name)).toEqual(["shop-plan", "shop", "shop-vault"]);
    expect(result.descriptors.map((d) => d.jsonShape.location)).toEqual(["westeurope", "westeurope", "westeurope"]);
  });

  it("does not emit a plan twice when a peer already declared it", () => {
    const result = compile(
      [
        createServicePlan({ name: "shared-plan" }),
        createWebApp({ name: "shop", servicePlan: { kind: "new", name: "shared-plan" } }),
      ],
      { location: "westeurope", logger: quietLogger() },
    );
    expect(result.descriptors.map((d) => d.name)).toEqual(["shared-plan", "shop"]);
    expect(result.descriptors[1]?.jsonShape.dependsOn).toEqual(["shared-plan"]);
  });

  it("rejects an explicit plan declared after a web app that already created it", () => {
    const builders = [
      createWebApp({ name: "shop", servicePlan: { kind: "new", name: "shared-plan" } }),
      createServicePlan({ name: "shared-plan", sku: Skus.S1 }),
    ];
    expect(() => compile(builders, { location: "westeurope", logger: quietLogger() })).toThrow(
      'Failed to build resources for "shared-plan": Resource "shared-plan" (Microsoft.Web/serverfarms) is declared more than once',
    );
  });

  it("rejects two builders emitting the same resource", () => {
    let caught: unknown;
    try {
      compile([createKeyVault({ name: "shop-vault" }), createKeyVault({ name: "shop-vault" })], {
        location: "westeurope",
        logger: quietLogger(),
      });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CompilationError);
    if (caught instanceof CompilationError) {
      expect(caught.resourceName).toBe("shop-vault");
      expect(caught.message).toBe(
        'Failed to build resources for "shop-vault": Resource "shop-vault" (Microsoft.KeyVault/vaults) is declared more than once',
      );
    }
  });

  it("allows the same name for resources of different types", () => {
    const result = compile(
      [createWebApp({ name: "shop", servicePlan: { kind: "new", name: "shop" } })],
      { location: "westeurope", logger: quietLogger() },
    );
    expect(result.descriptors.map((d) => d.name)).toEqual(["shop", "shop"]);
  });

  it("orders a site after an existing plan declared in the same batch", () => {
    const result = compile(
      [
        createServicePlan({ name: "shared-plan" }),
        createWebApp({ name: "shop", servicePlan: { kind: "existing", name: "shared-plan" } }),
      ],
      { location: "westeurope", logger: quietLogger() },
    );
    expect(result.descriptors.map((d) => d.name)).toEqual(["shared-plan", "shop"]);
    expect(result.descriptors[1]?.jsonShape.dependsOn).toEqual(["shared-plan"]);
  });

  it("deduplicates the secret manifest keeping the first declaration order", () => {
    const result = compile(
      [
        createWebApp({
          name: "shop",
          appSettings: [
            ["DB_PASSWORD", secureSetting("db-password")],
            ["API_KEY", secureSetting("api-key")],
          ],
        }),
        createWebApp({ name: "admin", appSettings: [["DB_PASSWORD", secureSetting("db-password")]] }),
        createKeyVault({
          name: "shop-vault",
          secrets: [createSecret({ key: "api-key" }), createSecret({ key: "storage-key" })],
        }),
      ],
      { location: "westeurope", logger: quietLogger() },
    );
    expect(result.secretManifest.map((p) => p.name)).toEqual(["db-password", "api-key", "storage-key"]);
  });

  it("queues post-deploy actions in declaration order", () => {
    const result = compile(
      [
        createWebApp({ name: "shop", zipDeployPath: "./shop-dist" }),
        createWebApp({ name: "plain" }),
        createWebApp({ name: "admin", zipDeployPath: "./admin.zip" }),
      ],
      { location: "westeurope", logger: quietLogger() },
    );
    expect(result.postDeployQueue.map((a) => [a.resourceName, a.description])).toEqual([
      ["shop", "Zip deploy ./shop-dist"],
      ["admin", "Zip deploy ./admin.zip"],
    ]);
  });

  it("uses the subscription tenant by default", () => {
    const result = compile([createKeyVault({ name: "shop-vault" })], { location: "westeurope", logger: quietLogger() });
    const properties = result.descriptors[0]?.jsonShape.properties;
    expect(properties).toMatchObject({ tenantId: "[subscription().tenantId]" });
  });

  it("passes a configured tenant to builders", () => {
    const result = compile([createKeyVault({ name: "shop-vault" })], {
      location: "westeurope",
      tenantId: guidExpression("00000000-0000-0000-0000-00000000000A"),
      logger: quietLogger(),
    });
    const properties = result.descriptors[0]?.jsonShape.properties;
    expect(properties).toMatchObject({ tenantId: "[string('00000000-0000-0000-0000-00000000000a')]" });
  });

  it("wraps builder failures in a CompilationError", () => {
    const compiler = createGraphCompiler({ location: "westeurope", logger: quietLogger() });
    let caught: unknown;
    try {
      compiler.compile([createWebApp({ name: "shop" }), failingBuilder("broken")]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CompilationError);
    if (caught instanceof CompilationError) {
      expect(caught.message).toBe('Failed to build resources for "broken": boom');
      expect(caught.resourceName).toBe("broken");
      expect(caught.code).toBe("COMPILATION_FAILED");
    }
  });

  it("logs each compiled configuration", () => {
    const transport = new MemoryTransport();
    compile([createWebApp({ name: "shop" })], { location: "westeurope", logger: quietLogger(transport) });
    expect(transport.messages()).toEqual(["Compiled shop", "Compiled 1 configurations into 2 resources"]);
  });

  it("starts every compilation with a fresh peer context", () => {
    const compiler = createGraphCompiler({ location: "westeurope", logger: quietLogger() });
    const builders = [createWebApp({ name: "shop" })];
    expect(compiler.compile(builders).descriptors).toHaveLength(2);
    expect(compiler.compile(builders).descriptors).toHaveLength(2);
  });
});
