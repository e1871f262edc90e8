export * from "./types/schemas";
export * from "./logging/error-handler";
export * from "./config/defaults";
export * from "./config/manifest-loader";
export * from "./config/settings";
export * from "./core/identifiers";
export * from "./core/network-flattener";
export * from "./core/template-resolver";
export * from "./core/image-catalog";
export * from "./core/cloud-init-configs";
export * from "./core/fleet-expander";
export * from "./core/reference-validator";
export * from "./core/cluster-topology";
export * from "./core/compiler";
export { FleetDeployment, FleetDeploymentArgs } from "./core/fleet-deployment";
export { runPulumi, fleetProgram, PulumiOptions, PulumiSummary, PulumiAction } from "./runner/pulumi-runner";
