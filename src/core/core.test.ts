import { describe, it, expect, expectTypeOf } from "vitest";
import { descriptorType, freezeDescriptor } from "./builder.js";
import {
  ArmGraphError,
  ArtifactClassificationError,
  CompilationError,
  ConfigurationError,
  DeploymentError,
  OperationCancelledError,
  formatError,
  isArmGraphError,
} from "./errors.js";
import {
  SUBSCRIPTION_TENANT_ID,
  armExpression,
  evalExpression,
  guidExpression,
  isGuid,
  parameterReference,
  secureParameter,
} from "./expression.js";
import { armLocation, childResourceName, featureFlagValue, resourceName, type Location } from "./types.js";

describe("resource names", () => {
  it("accepts non-empty names", () => {
    expect(resourceName("shop")).toBe("shop");
  });

  it("rejects empty and blank names", () => {
    expect(() => resourceName("")).toThrow("Resource names must not be empty");
    expect(() => resourceName("  ")).toThrow(ConfigurationError);
  });

  it("joins child names with a slash", () => {
    expect(childResourceName(resourceName("shop-vault"), "db-password")).toBe("shop-vault/db-password");
  });
});

describe("armLocation", () => {
  it("normalizes display names", () => {
    expect(armLocation("West Europe")).toBe("westeurope");
    expect(armLocation("eastus2")).toBe("eastus2");
  });

  it("keeps the known regions distinct from plain strings", () => {
    expectTypeOf<Location>().not.toEqualTypeOf<string>();
    expectTypeOf<"westeurope">().toMatchTypeOf<Location>();
    expectTypeOf<string>().toMatchTypeOf<Location>();
  });
});

describe("featureFlagValue", () => {
  it("maps flags to booleans", () => {
    expect(featureFlagValue("Enabled")).toBe(true);
    expect(featureFlagValue("Disabled")).toBe(false);
  });
});

describe("expressions", () => {
  it("wraps expressions in brackets", () => {
    expect(evalExpression(armExpression("  resourceGroup().location "))).toBe("[resourceGroup().location]");
    expect(evalExpression(SUBSCRIPTION_TENANT_ID)).toBe("[subscription().tenantId]");
  });

  it("rejects empty expressions", () => {
    expect(() => armExpression(" ")).toThrow("ARM expressions must not be empty");
  });

  it("converts GUIDs to lowercase string expressions", () => {
    expect(isGuid("AAAAAAAA-BBBB-CCCC-DDDD-EEEEEEEEEEEE")).toBe(true);
    expect(evalExpression(guidExpression("AAAAAAAA-BBBB-CCCC-DDDD-EEEEEEEEEEEE"))).toBe(
      "[string('aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee')]",
    );
  });

  it("rejects malformed GUIDs", () => {
    expect(isGuid("not-a-guid")).toBe(false);
    expect(() => guidExpression("not-a-guid")).toThrow('"not-a-guid" is not a valid GUID');
  });
});

describe("secure parameters", () => {
  it("references parameters by name", () => {
    expect(parameterReference(secureParameter("db-password"))).toBe("[parameters('db-password')]");
  });

  it("rejects blank names", () => {
    expect(() => secureParameter("")).toThrow("Secure parameter names must not be empty");
  });
});

describe("descriptors", () => {
  it("deep-freezes the shape", () => {
    const descriptor = freezeDescriptor(resourceName("shop"), {
      type: "Microsoft.Web/sites",
      properties: { siteConfig: { appSettings: [{ name: "MODE", value: "production" }] } },
    });

    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.jsonShape.properties)).toBe(true);
    expect(descriptor).toHaveProperty("jsonShape.properties.siteConfig.appSettings");
    expect(Object.isFrozen(descriptor.jsonShape)).toBe(true);
  });

  it("reads the resource type", () => {
    expect(descriptorType(freezeDescriptor(resourceName("shop"), { type: "Microsoft.Web/sites" }))).toBe("Microsoft.Web/sites");
    expect(descriptorType(freezeDescriptor(resourceName("shop"), {}))).toBeUndefined();
  });
});

describe("errors", () => {
  it("carries codes through the hierarchy", () => {
    expect(new ConfigurationError("bad").code).toBe("CONFIGURATION_INVALID");
    expect(new ArtifactClassificationError("/tmp/x").code).toBe("ARTIFACT_UNCLASSIFIABLE");
    expect(new CompilationError("shop", { cause: new Error("boom") }).code).toBe("COMPILATION_FAILED");
    expect(new DeploymentError("shop", "failed").code).toBe("DEPLOYMENT_FAILED");
    expect(new OperationCancelledError("Archiving").code).toBe("OPERATION_CANCELLED");
  });

  it("keeps subclass relationships", () => {
    const err = new ArtifactClassificationError("/tmp/x");
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toBeInstanceOf(ArmGraphError);
    expect(isArmGraphError(err)).toBe(true);
    expect(isArmGraphError(new Error("plain"))).toBe(false);
  });

  it("records context and cause", () => {
    const cause = new Error("boom");
    const err = new CompilationError("shop", { cause });
    expect(err.message).toBe('Failed to build resources for "shop": boom');
    expect(err.context).toEqual({ resourceName: "shop" });
    expect(err.cause).toBe(cause);
    expect(new ArtifactClassificationError("/tmp/x").context).toEqual({ path: "/tmp/x" });
  });

  it("formats any thrown value", () => {
    expect(formatError(new Error("boom"))).toBe("boom");
    expect(formatError("plain")).toBe("plain");
    expect(formatError(undefined)).toBe("Unknown error");
    expect(formatError({ code: 7 })).toBe('{"code":7}');
  });
});
