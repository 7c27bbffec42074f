export {
  WmiSecurityManager,
  createWmiSecurityManager,
  type WmiEditResult,
  type WmiGrantOptions,
  type WmiSecurityView,
} from "./manager.js";
