import { describe, it, expect } from "vitest";
import { compile } from "../compiler/index.js";
import { ConfigurationError } from "../core/errors.js";
import { armExpression, guidExpression } from "../core/expression.js";
import { resourceName } from "../core/types.js";
import { MemoryTransport, SubsystemLogger } from "../logging/index.js";
import { accessPolicy, createKeyVault, readerPolicy, resolveCreateMode, type KeyVaultInput } from "./config.js";
import { MAX_SECRET_KEY_LENGTH, createSecret, isValidSecretKey } from "./secret.js";
import { createModeToken } from "./vault.js";

const logger = new SubsystemLogger("test", { transports: [new MemoryTransport()] });

const principal = armExpression("reference('shop', '2016-08-01', 'full').identity.principalId");

function shapes(input: KeyVaultInput) {
  return compile([createKeyVault(input)], { location: "westeurope", logger }).descriptors;
}

describe("createKeyVault", () => {
  it("serializes a vault with defaults", () => {
    const [vault] = shapes({ name: "shop-vault" });
    expect(vault?.name).toBe("shop-vault");
    expect(vault?.jsonShape).toEqual({
      type: "Microsoft.KeyVault/vaults",
      apiVersion: "2019-09-01",
      name: "shop-vault",
      location: "westeurope",
      properties: {
        tenantId: "[subscription().tenantId]",
        sku: { name: "standard", family: "A" },
        enabledForTemplateDeployment: true,
        accessPolicies: [],
        networkAcls: { ipRules: [], virtualNetworkRules: [] },
      },
    });
  });

  it("serializes access toggles, soft delete and network rules", () => {
    const [vault] = shapes({
      name: "shop-vault",
      sku: "premium",
      tenantId: guidExpression("11111111-2222-3333-4444-555555555555"),
      access: {
        virtualMachineAccess: "Enabled",
        diskEncryptionAccess: "Disabled",
        rbacAuthorization: "Enabled",
        softDelete: "SoftDeleteWithPurgeProtection",
      },
      networkAcl: {
        ipRules: ["10.0.0.0/24", "10.0.1.4"],
        vnetRules: ["/subscriptions/sub/resourceGroups/rg/providers/Microsoft.Network/virtualNetworks/vnet/subnets/web"],
        defaultAction: "Deny",
        bypass: "AzureServices",
      },
      uri: "https://shop-vault.vault.azure.net",
    });

    expect(vault?.jsonShape.properties).toEqual({
      tenantId: "[string('11111111-2222-3333-4444-555555555555')]",
      sku: { name: "premium", family: "A" },
      enabledForDeployment: true,
      enabledForDiskEncryption: false,
      enabledForTemplateDeployment: true,
      enableRbacAuthorization: true,
      enableSoftDelete: true,
      enablePurgeProtection: true,
      vaultUri: "https://shop-vault.vault.azure.net",
      accessPolicies: [],
      networkAcls: {
        bypass: "AzureServices",
        defaultAction: "Deny",
        ipRules: [{ value: "10.0.0.0/24" }, { value: "10.0.1.4" }],
        virtualNetworkRules: [
          { id: "/subscriptions/sub/resourceGroups/rg/providers/Microsoft.Network/virtualNetworks/vnet/subnets/web" },
        ],
      },
    });
  });

  it("lets callers turn off template deployment access", () => {
    const [vault] = shapes({ name: "shop-vault", access: { resourceManagerAccess: "Disabled", softDelete: "SoftDeleteOnly" } });
    expect(vault?.jsonShape.properties).toMatchObject({ enabledForTemplateDeployment: false, enableSoftDelete: true });
    expect(vault?.jsonShape.properties).not.toHaveProperty("enablePurgeProtection");
  });

  it("serializes access policies with the vault tenant", () => {
    const [vault] = shapes({
      name: "shop-vault",
      accessPolicies: [
        accessPolicy({ objectId: principal, secrets: ["get", "list", "get"] }),
        accessPolicy({
          objectId: principal,
          applicationId: "aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee",
          keys: ["wrapKey", "unwrapKey"],
        }),
      ],
    });

    expect(vault?.jsonShape.properties).toHaveProperty("accessPolicies", [
      {
        objectId: "[reference('shop', '2016-08-01', 'full').identity.principalId]",
        tenantId: "[subscription().tenantId]",
        permissions: { keys: [], secrets: ["get", "list"], certificates: [], storage: [] },
      },
      {
        objectId: "[reference('shop', '2016-08-01', 'full').identity.principalId]",
        tenantId: "[subscription().tenantId]",
        applicationId: "aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee",
        permissions: { keys: ["wrapKey", "unwrapKey"], secrets: [], certificates: [], storage: [] },
      },
    ]);
  });

  it("rejects duplicate secret keys", () => {
    expect(() =>
      createKeyVault({
        name: "shop-vault",
        secrets: [createSecret({ key: "db-password" }), createSecret({ key: "db-password" })],
      }),
    ).toThrow('Key vault "shop-vault" declares secret "db-password" more than once');
  });
});

describe("create mode", () => {
  it("fails Recover mode without an access policy", () => {
    expect(() => createKeyVault({ name: "shop-vault", createMode: "Recover" })).toThrow(ConfigurationError);
    expect(() => createKeyVault({ name: "shop-vault", createMode: "Recover" })).toThrow(
      "Setting the creation mode to Recover requires at least one access policy.",
    );
  });

  it("emits the recover token when Recover mode has a policy", () => {
    const [vault] = shapes({ name: "shop-vault", createMode: "Recover", accessPolicies: [readerPolicy(principal)] });
    expect(vault?.jsonShape.properties).toMatchObject({ createMode: "recover" });
  });

  it("emits the default token and omits unspecified modes", () => {
    const [explicit] = shapes({ name: "shop-vault", createMode: "Default" });
    expect(explicit?.jsonShape.properties).toMatchObject({ createMode: "default" });

    const [unspecified] = shapes({ name: "shop-vault" });
    expect(unspecified?.jsonShape.properties).not.toHaveProperty("createMode");
  });

  it("maps modes to tokens", () => {
    expect(createModeToken(resolveCreateMode(undefined, []))).toBeUndefined();
    expect(createModeToken(resolveCreateMode("Default", []))).toBe("default");
    expect(createModeToken(resolveCreateMode("Recover", [readerPolicy(principal)]))).toBe("recover");
  });
});

describe("accessPolicy", () => {
  it("rejects application IDs that are not GUIDs", () => {
    expect(() => accessPolicy({ objectId: principal, applicationId: "not-a-guid" })).toThrow(
      'Application ID "not-a-guid" is not a valid GUID',
    );
  });

  it("builds a secret reader policy", () => {
    expect(readerPolicy(principal).permissions).toEqual({ keys: [], secrets: ["get"], certificates: [], storage: [] });
  });
});

describe("secrets", () => {
  it("accepts valid keys and rejects invalid ones", () => {
    expect(isValidSecretKey("my-secret")).toBe(true);
    expect(isValidSecretKey("abc123")).toBe(true);
    expect(isValidSecretKey("a".repeat(MAX_SECRET_KEY_LENGTH))).toBe(true);
    expect(isValidSecretKey("my_secret")).toBe(false);
    expect(isValidSecretKey("")).toBe(false);
    expect(isValidSecretKey("   ")).toBe(false);
    expect(isValidSecretKey("a".repeat(128))).toBe(false);
  });

  it("accepts non-ASCII letters and digits in keys", () => {
    expect(isValidSecretKey("café")).toBe(true);
    expect(isValidSecretKey("Ключ-2")).toBe(true);
    expect(isValidSecretKey("é".repeat(MAX_SECRET_KEY_LENGTH))).toBe(true);
    expect(isValidSecretKey("é".repeat(MAX_SECRET_KEY_LENGTH + 1))).toBe(false);
    expect(isValidSecretKey("café key")).toBe(false);
    expect(createSecret({ key: "café" }).key).toBe("café");
  });

  it("fails at finalization for invalid keys", () => {
    expect(() => createSecret({ key: "my_secret" })).toThrow(
      'Invalid secret key "my_secret": Key Vault key names must be a 1-127 character string containing only letters, digits and -.',
    );
  });

  it("emits parameter secrets as children of the vault", () => {
    const descriptors = shapes({ name: "shop-vault", secrets: [createSecret({ key: "db-password" })] });
    expect(descriptors.map((d) => d.name)).toEqual(["shop-vault", "shop-vault/db-password"]);
    expect(descriptors[1]?.jsonShape).toEqual({
      type: "Microsoft.KeyVault/vaults/secrets",
      apiVersion: "2019-09-01",
      name: "shop-vault/db-password",
      location: "westeurope",
      dependsOn: ["shop-vault"],
      properties: { value: "[parameters('db-password')]", attributes: {} },
    });
  });

  it("emits expression secrets depending on their owner", () => {
    const descriptors = shapes({
      name: "shop-vault",
      secrets: [
        createSecret({
          key: "storage-key",
          value: armExpression("listKeys('store', '2019-06-01').keys[0].value"),
          owner: resourceName("store"),
          contentType: "text/plain",
          enabled: true,
          activationDate: new Date("2030-01-01T00:00:00Z"),
          expirationDate: new Date("2031-01-01T00:00:00Z"),
        }),
      ],
    });

    expect(descriptors[1]?.jsonShape).toMatchObject({
      dependsOn: ["shop-vault", "store"],
      properties: {
        value: "[listKeys('store', '2019-06-01').keys[0].value]",
        contentType: "text/plain",
        attributes: { enabled: true, nbf: 1893456000, exp: 1924992000 },
      },
    });
  });

  it("only parameter secrets contribute secure parameters", () => {
    const vault = createKeyVault({
      name: "shop-vault",
      secrets: [
        createSecret({ key: "db-password" }),
        createSecret({ key: "storage-key", value: armExpression("listKeys('store', '2019-06-01').keys[0].value") }),
      ],
    });
    expect(vault.secureParameters()).toEqual([{ name: "db-password" }]);
  });

  it("freezes emitted descriptors", () => {
    const [vault] = shapes({ name: "shop-vault" });
    expect(Object.isFrozen(vault?.jsonShape)).toBe(true);
    expect(Object.isFrozen(vault?.jsonShape.properties)).toBe(true);
  });
});
