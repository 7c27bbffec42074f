export { LabVMManager, createVMManager, parsePowerState } from "./manager.js";
export {
  LAB_TAG,
  type LabVMInstance,
  type RestartOptions,
  type VMOperation,
  type VMOperationResult,
  type VMPowerState,
} from "./types.js";
