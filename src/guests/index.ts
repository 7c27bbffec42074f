export {
  TEMPLATE_ROOT,
  KICKSTART_TEMPLATES,
  POSTINSTALL_TEMPLATE,
  CLOUDINIT_DIAGNOSIS_TEMPLATE,
  readTemplate,
  listPlaceholders,
  renderTemplate,
} from "./templates.js";
export { kickstartValues, renderKickstart, rootPasswordDirective, findGuest, type KickstartValues } from "./kickstart.js";
export {
  POSTINSTALL_COMPLETE,
  DEFAULT_GUEST_PORTS,
  renderPostInstall,
  renderCloudInitDiagnosis,
  parseCloudInitDiagnosis,
  type CloudInitDiagnosis,
  type CloudInitService,
} from "./postinstall.js";
