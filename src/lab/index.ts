export {
  LAB_STATE_FILE,
  LabManager,
  type ConfigureOptions,
  type LabManagerOptions,
  type LabState,
  type StatusResult,
  type TerraformOps,
} from "./manager.js";
