/**
 * Guest post-install and cloud-init diagnosis scripts.
 */

import type { LabConfig } from "../config/schema.js";
import { CLOUDINIT_DIAGNOSIS_TEMPLATE, POSTINSTALL_TEMPLATE, readTemplate, renderTemplate } from "./templates.js";

/** Last line printed by a post-install run that got to the end. */
export const POSTINSTALL_COMPLETE = "POSTINSTALL_COMPLETE";

const KEY_VALUE = /^([A-Z_]+)=(.*)$/;

export const DEFAULT_GUEST_PORTS = ["8080/tcp", "3000/tcp"];

export async function renderPostInstall(
  config: LabConfig,
  options: { ports?: readonly string[]; templateRoot?: string } = {},
): Promise<string> {
  const template = await readTemplate(POSTINSTALL_TEMPLATE, options.templateRoot);
  return renderTemplate(
    template,
    {
      labUser: config.guests.labUser,
      firewallPorts: (options.ports ?? DEFAULT_GUEST_PORTS).join(" "),
    },
    POSTINSTALL_TEMPLATE,
  );
}

export async function renderCloudInitDiagnosis(templateRoot?: string): Promise<string> {
  const template = await readTemplate(CLOUDINIT_DIAGNOSIS_TEMPLATE, templateRoot);
  return renderTemplate(template, {}, CLOUDINIT_DIAGNOSIS_TEMPLATE);
}

export type PostInstallProgress = {
  /** Stages the script started, in order. */
  stages: string[];
  /** Stage of the command that failed, when the script printed it. */
  failedStage?: string;
  completed: boolean;
  /** Output without the progress lines. */
  messages: string[];
};

/** Read the `STAGE=` and `FAILED_STAGE=` lines of a post-install run. */
export function parsePostInstallProgress(output: readonly string[]): PostInstallProgress {
  const progress: PostInstallProgress = { stages: [], completed: false, messages: [] };
  for (const raw of output) {
    const line = raw.trim();
    const match = KEY_VALUE.exec(line);
    if (match?.[1] === "STAGE") {
      progress.stages.push(match[2]);
    } else if (match?.[1] === "FAILED_STAGE") {
      progress.failedStage = match[2];
    } else if (line === POSTINSTALL_COMPLETE) {
      progress.completed = true;
    } else {
      progress.messages.push(raw);
    }
  }
  return progress;
}

// =============================================================================
// Diagnosis Parsing
// =============================================================================

export type CloudInitService = {
  name: string;
  /** `systemctl is-enabled` state, e.g. `enabled`, `disabled`, `masked`. */
  enabled: string;
  /** `systemctl is-active` state. */
  active: string;
};

export type CloudInitDiagnosis = {
  /** `cloud-init status`, or `not-installed`. */
  status: string;
  services: CloudInitService[];
  disableFiles: Array<{ path: string; present: boolean }>;
  dsIdentifyConfigured: boolean;
  /** Result of running ds-identify: `found`, `not-found`, or `missing` when the tool is absent. */
  dsIdentifyCheck: string;
  /** `datasource_list` that ds-identify wrote to /run/cloud-init/cloud.cfg. */
  datasources: string[];
  /** Whether the systemd generator that enables cloud-init at boot is installed. */
  generatorPresent: boolean;
  /** DMI product name, `Virtual Machine` under Hyper-V. */
  productName: string;
  cdrom: { present: boolean; files: string[] };
  /** True when cloud-init will not run on the next boot. */
  disabled: boolean;
};

/**
 * Parse the `KEY=value` lines printed by the diagnosis script. Other lines
 * are ignored, so a tail of the output is enough.
 */
export function parseCloudInitDiagnosis(output: string | readonly string[]): CloudInitDiagnosis {
  const lines = typeof output === "string" ? output.split(/\r?\n/) : output;
  const diagnosis: CloudInitDiagnosis = {
    status: "unknown",
    services: [],
    disableFiles: [],
    dsIdentifyConfigured: false,
    dsIdentifyCheck: "unknown",
    datasources: [],
    generatorPresent: false,
    productName: "unknown",
    cdrom: { present: false, files: [] },
    disabled: false,
  };

  for (const raw of lines) {
    const match = KEY_VALUE.exec(raw.trim());
    if (!match) continue;
    const [, key, value] = match;

    switch (key) {
      case "STATUS":
        diagnosis.status = value;
        break;
      case "SERVICE": {
        const [name, enabled = "unknown", active = "unknown"] = value.split(":");
        diagnosis.services.push({ name, enabled, active });
        break;
      }
      case "DISABLE_FILE": {
        const at = value.lastIndexOf(":");
        if (at > 0) diagnosis.disableFiles.push({ path: value.slice(0, at), present: value.slice(at + 1) === "present" });
        break;
      }
      case "DS_IDENTIFY":
        diagnosis.dsIdentifyConfigured = value === "configured";
        break;
      case "DS_IDENTIFY_CHECK":
        diagnosis.dsIdentifyCheck = value;
        break;
      case "DATASOURCES":
        diagnosis.datasources = value.split(",").filter((name) => name.length > 0);
        break;
      case "GENERATOR":
        diagnosis.generatorPresent = value === "present";
        break;
      case "PRODUCT_NAME":
        diagnosis.productName = value;
        break;
      case "CDROM":
        diagnosis.cdrom.present = value === "present";
        break;
      case "CDROM_FILE":
        diagnosis.cdrom.files.push(value);
        break;
    }
  }

  diagnosis.disabled =
    diagnosis.status === "not-installed" ||
    diagnosis.status === "disabled" ||
    diagnosis.disableFiles.some((f) => f.present) ||
    diagnosis.dsIdentifyCheck === "not-found" ||
    (diagnosis.services.length > 0 && diagnosis.services.every((s) => s.enabled !== "enabled"));

  return diagnosis;
}
