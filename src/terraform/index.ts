export { HclExpr, hclRef, quoteHcl, formatValue, renderBlock, renderFile, type HclBlock, type HclValue } from "./hcl.js";
export {
  TEMPLATE_FILES,
  AZURERM_PROVIDER_VERSION,
  buildLabTemplate,
  writeLabTemplate,
  labTags,
  type LabTemplate,
  type TemplateFileName,
} from "./lab-template.js";
export {
  tfInit,
  tfValidate,
  tfPlan,
  tfApply,
  tfDestroy,
  tfOutput,
  tfVersion,
  isTerraformInstalled,
  ensureSuccess,
  labTerraformEnv,
  type TfCliOptions,
  type TfCliResult,
} from "./cli-wrapper.js";
export { parseLabOutputs, parseValidation, type TfValidation } from "./outputs.js";
