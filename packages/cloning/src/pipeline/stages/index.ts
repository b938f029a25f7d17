export type { PipelineStage } from "./stage";
export { snapshotStage, SNAPSHOT_SKU } from "./snapshot.stage";
export { diskStage, STANDARD_DISK_SKU, PREMIUM_DISK_SKU } from "./disk.stage";
export { networkStage } from "./network.stage";
export { nsgStage, DEFAULT_NSG_MODE } from "./nsg.stage";
export { nicStage } from "./nic.stage";
export { diagnosticsStage, findDiagnosticsAccount } from "./diagnostics.stage";
export { vmAssemblyStage, vmCreationStage, buildVmDefinition, blobEndpointFor } from "./vm.stage";
export type { VmDefinitionInput } from "./vm.stage";
