export { type ArmResource, type ArmResourceKind, serializeResource, describeResource } from "./resources.js";
