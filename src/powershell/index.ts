/**
 * PowerShell Module Index
 */

export { psString, psNumber, psBool, psArray, psHashtable, psValue, psBase64, type PsValue } from "./quote.js";
export {
  RESULT_MARKER,
  ERROR_MARKER,
  ScriptBuilder,
  PsExpr,
  ps,
  createScript,
  createShellScript,
  renderScript,
  type PowerShellScript,
  type ScriptKind,
  type ResultFields,
} from "./script.js";
export * from "./recipes/index.js";
