/**
 * Lab Manager
 *
 * Ties the Azure side (terraform), the step engine and the node helpers
 * together for the CLI. Everything that touches Azure is created lazily,
 * so render, dry runs and tests never need credentials.
 */

import { existsSync } from "node:fs";
import { readFile, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { z } from "zod";
import { requireAdminPassword } from "../config/loader.js";
import { deriveNodes, type LabConfig } from "../config/schema.js";
import { createCredentialsManagerFromConfig, type LabCredentialsManager } from "../credentials/index.js";
import { collectNodeReport, reportExpectations, summarizeReports, type NodeStatusReport, type StatusSummary } from "../diagnostics/index.js";
import { LabError } from "../errors.js";
import {
  findGuest,
  parseCloudInitDiagnosis,
  renderCloudInitDiagnosis,
  renderKickstart,
  type CloudInitDiagnosis,
} from "../guests/index.js";
import { getLabLogger } from "../logging/index.js";
import {
  Orchestrator,
  getBlueprint,
  registerLabSteps,
  type ExecutionPlan,
  type OrchestrationEventListener,
  type OrchestrationResult,
} from "../orchestration/index.js";
import { DEFAULT_HOST_KEY_PATH, guestShellResultSchema, runGuestShell } from "../powershell/index.js";
import { createMultiStepProgress, type ProgressOptions } from "../progress.js";
import { AzureRunCommandRunner, runRecipe, type CommandRunner } from "../remote/index.js";
import {
  ensureSuccess,
  isTerraformInstalled,
  labTerraformEnv,
  parseLabOutputs,
  parseValidation,
  tfApply,
  tfDestroy,
  tfInit,
  tfOutput,
  tfPlan,
  tfValidate,
  writeLabTemplate,
  type TfCliOptions,
  type TfValidation,
} from "../terraform/index.js";
import type { LabOutputs, LabRetryOptions, NodeTarget } from "../types.js";
import { LabVMManager } from "../vms/index.js";
import { WmiSecurityManager } from "../wmi/index.js";

// =============================================================================
// Types
// =============================================================================

export const LAB_STATE_FILE = "lab-state.json";

export type TerraformOps = {
  installed: typeof isTerraformInstalled;
  init: typeof tfInit;
  validate: typeof tfValidate;
  plan: typeof tfPlan;
  apply: typeof tfApply;
  destroy: typeof tfDestroy;
  output: typeof tfOutput;
};

const DEFAULT_TERRAFORM: TerraformOps = {
  installed: isTerraformInstalled,
  init: tfInit,
  validate: tfValidate,
  plan: tfPlan,
  apply: tfApply,
  destroy: tfDestroy,
  output: tfOutput,
};

export type LabManagerOptions = {
  /** Remote runner; defaults to Azure Run Command. */
  runner?: CommandRunner;
  vms?: Pick<LabVMManager, "restartVM">;
  credentials?: LabCredentialsManager;
  terraform?: Partial<TerraformOps>;
  /** Asked before destroying anything; teardown is refused without it unless `yes`. */
  confirm?: (question: string) => Promise<boolean>;
  progress?: ProgressOptions;
};

export type ConfigureOptions = {
  /** Blueprint parameters. */
  params?: Record<string, unknown>;
  /** Node names, for blueprints that take a `nodes` parameter. */
  nodes?: string[];
  dryRun?: boolean;
  failFast?: boolean;
  signal?: AbortSignal;
  onEvent?: OrchestrationEventListener;
};

export type StatusResult = {
  reports: NodeStatusReport[];
  summary: StatusSummary;
};

const labStateSchema = z.object({
  savedAt: z.string(),
  outputs: z.object({
    resourceGroup: z.string(),
    nodes: z.array(
      z.object({
        name: z.string(),
        resourceGroup: z.string(),
        privateIp: z.string(),
        publicIp: z.string().optional(),
      }),
    ),
  }),
});

export type LabState = z.infer<typeof labStateSchema>;

// =============================================================================
// Lab Manager
// =============================================================================

export class LabManager {
  private log = getLabLogger("lab");
  private terraform: TerraformOps;
  private cachedRunner: CommandRunner | null;
  private cachedVms: Pick<LabVMManager, "restartVM"> | null;
  private cachedCredentials: LabCredentialsManager | null;

  constructor(
    readonly config: LabConfig,
    private options: LabManagerOptions = {},
  ) {
    this.terraform = { ...DEFAULT_TERRAFORM, ...options.terraform };
    this.cachedRunner = options.runner ?? null;
    this.cachedVms = options.vms ?? null;
    this.cachedCredentials = options.credentials ?? null;
  }

  get workingDir(): string {
    return resolve(this.config.terraform.workingDir);
  }

  get statePath(): string {
    return join(this.workingDir, LAB_STATE_FILE);
  }

  // ===========================================================================
  // Azure side
  // ===========================================================================

  /** Write the terraform files. Returns their paths. */
  async render(): Promise<string[]> {
    const files = await writeLabTemplate(this.config, this.workingDir);
    this.log.info(`Wrote ${files.length} terraform files to ${this.workingDir}`);
    return files;
  }

  /** Render, init and validate the template. */
  async validate(): Promise<TfValidation> {
    await this.preflight();
    await this.render();
    const opts = this.tfOptions();
    ensureSuccess("init", await this.terraform.init(opts));
    const result = await this.terraform.validate(opts);
    if (result.json === undefined) ensureSuccess("validate", result);
    return parseValidation(result.json);
  }

  /** Render, init and plan. Returns the plan text. */
  async plan(flags: { destroy?: boolean } = {}): Promise<string> {
    const opts = this.tfOptions({ withPassword: true });
    await this.preflight();
    await this.render();
    ensureSuccess("init", await this.terraform.init(opts));
    return ensureSuccess("plan", await this.terraform.plan(opts, { destroy: flags.destroy })).stdout;
  }

  /**
   * Render, init and apply, then read the outputs and save them as the
   * lab state.
   */
  async provision(): Promise<LabOutputs> {
    const opts = this.tfOptions({ withPassword: true });
    await this.preflight();
    const progress = createMultiStepProgress("provision", 4, this.options.progress);
    try {
      progress.nextStep("render");
      await this.render();

      progress.nextStep("terraform init");
      ensureSuccess("init", await this.terraform.init(opts));

      progress.nextStep("terraform apply");
      ensureSuccess("apply", await this.terraform.apply(opts));

      progress.nextStep("terraform output");
      const outputs = await this.readTerraformOutputs(opts);
      await this.saveState(outputs);
      this.log.info(`Provisioned ${outputs.nodes.length} nodes in ${outputs.resourceGroup}`);
      return outputs;
    } finally {
      progress.done();
    }
  }

  /**
   * Destroy the Azure side. Returns false when the confirmation was declined.
   */
  async teardown(options: { yes?: boolean } = {}): Promise<boolean> {
    if (!options.yes) {
      const question = `Destroy resource group ${this.config.azure.resourceGroup} and every lab VM?`;
      const confirmed = this.options.confirm ? await this.options.confirm(question) : false;
      if (!confirmed) {
        this.log.info("Teardown cancelled");
        return false;
      }
    }

    const opts = this.tfOptions({ withPassword: true });
    await this.preflight();
    await this.render();
    ensureSuccess("init", await this.terraform.init(opts));
    ensureSuccess("destroy", await this.terraform.destroy(opts));
    await rm(this.statePath, { force: true });
    this.log.info(`Destroyed ${this.config.azure.resourceGroup}`);
    return true;
  }

  /**
   * Lab nodes from the saved state, or from `terraform output` when no state
   * was saved.
   */
  async loadOutputs(): Promise<LabOutputs> {
    const state = await this.readState();
    if (state) return state.outputs;

    await this.preflight();
    const outputs = await this.readTerraformOutputs(this.tfOptions());
    await this.saveState(outputs);
    return outputs;
  }

  /** Nodes as the configuration expects them, before anything exists. */
  expectedNodes(): NodeTarget[] {
    return deriveNodes(this.config).map((n) => ({
      name: n.name,
      resourceGroup: this.config.azure.resourceGroup,
      privateIp: n.privateIp,
    }));
  }

  async node(name: string): Promise<NodeTarget> {
    const { nodes } = await this.loadOutputs();
    const node = nodes.find((n) => n.name.toLowerCase() === name.toLowerCase());
    if (!node) {
      throw new LabError(`Unknown node ${name} (lab nodes: ${nodes.map((n) => n.name).join(", ")})`, "UNKNOWN_NODE");
    }
    return node;
  }

  // ===========================================================================
  // Configuration runs
  // ===========================================================================

  /** Generate a plan from a blueprint. Dry runs use the expected nodes. */
  async createPlan(blueprintId: string, options: ConfigureOptions = {}): Promise<ExecutionPlan> {
    const blueprint = getBlueprint(blueprintId);
    if (!blueprint) throw new LabError(`Unknown blueprint "${blueprintId}"`, "UNKNOWN_BLUEPRINT");

    const nodes = options.dryRun ? this.expectedNodes() : (await this.loadOutputs()).nodes;
    const params: Record<string, unknown> = { ...options.params };
    if (options.nodes && options.nodes.length > 0) {
      if (!blueprint.parameters.some((p) => p.name === "nodes")) {
        throw new LabError(`Blueprint "${blueprintId}" does not take --node`, "INVALID_BLUEPRINT_PARAMS");
      }
      params.nodes = options.nodes;
    }
    return blueprint.generate({ config: this.config, nodes }, params);
  }

  async configure(blueprintId: string, options: ConfigureOptions = {}): Promise<OrchestrationResult> {
    const plan = await this.createPlan(blueprintId, options);
    return this.execute(plan, options);
  }

  /** Run a plan against the lab nodes. */
  async execute(plan: ExecutionPlan, options: ConfigureOptions = {}): Promise<OrchestrationResult> {
    const nodes = options.dryRun ? this.expectedNodes() : (await this.loadOutputs()).nodes;
    registerLabSteps(() => ({
      config: this.config,
      nodes,
      runner: this.runner(),
      vms: this.vms(),
      wmi: this.wmi(),
    }));

    const { orchestration } = this.config;
    const orchestrator = new Orchestrator({
      dryRun: options.dryRun,
      failFast: options.failFast,
      stepTimeoutMs: orchestration.stepTimeoutMs,
      maxRetries: orchestration.maxRetries,
      retryDelayMs: orchestration.retryDelayMs,
      signal: options.signal,
    });
    const unsubscribe = options.onEvent ? orchestrator.on(options.onEvent) : undefined;
    try {
      return await orchestrator.execute(plan);
    } finally {
      unsubscribe?.();
    }
  }

  // ===========================================================================
  // Node helpers
  // ===========================================================================

  /** Collect and evaluate the status of the given nodes (all by default). */
  async status(nodeNames: readonly string[] = []): Promise<StatusResult> {
    const { nodes } = await this.loadOutputs();
    const selected = nodeNames.length === 0 ? nodes : await Promise.all(nodeNames.map((name) => this.node(name)));
    const expected = reportExpectations(this.config);

    const reports: NodeStatusReport[] = [];
    for (const node of selected) {
      reports.push(await collectNodeReport(this.runner(), node, expected));
    }
    return { reports, summary: summarizeReports(reports) };
  }

  wmi(): WmiSecurityManager {
    return new WmiSecurityManager(this.runner());
  }

  // ===========================================================================
  // Guests
  // ===========================================================================

  /** Kickstart file for a configured guest. */
  async guestKickstart(guest: string, publicKey: string): Promise<string> {
    return renderKickstart(this.config, findGuest(this.config, guest), publicKey);
  }

  /** Run the cloud-init diagnosis on a guest from its Hyper-V host. */
  async guestDiagnose(guest: string, options: { keyPath?: string } = {}): Promise<CloudInitDiagnosis> {
    const vm = findGuest(this.config, guest);
    const host = await this.guestHost();
    const script = runGuestShell({
      name: `diagnose-${vm.name}`,
      address: vm.ipAddress,
      user: "root",
      keyPath: options.keyPath ?? DEFAULT_HOST_KEY_PATH,
      script: await renderCloudInitDiagnosis(),
      tailLines: 80,
    });
    const result = await runRecipe(this.runner(), host, script, guestShellResultSchema);
    if (result.exitCode !== 0) {
      throw new LabError(
        `Diagnosis on ${vm.name} exited with ${result.exitCode}: ${result.output.slice(-3).join(" | ")}`,
        "GUEST_COMMAND_FAILED",
      );
    }
    return parseCloudInitDiagnosis(result.output);
  }

  /** Run the post-install step for one guest. */
  async guestPostinstall(
    guest: string,
    options: ConfigureOptions & { ports?: string[]; keyPath?: string } = {},
  ): Promise<OrchestrationResult> {
    const vm = findGuest(this.config, guest);
    const host = options.dryRun ? this.expectedHost() : await this.guestHost();
    const params: Record<string, unknown> = { node: host.name, guest: vm.name };
    if (options.ports) params.ports = options.ports;
    if (options.keyPath) params.keyPath = options.keyPath;

    const plan: ExecutionPlan = {
      id: `postinstall-${vm.name}-${Date.now()}`,
      name: `Post-install ${vm.name}`,
      description: `Run the post-install script on ${vm.name}`,
      steps: [
        {
          id: "postinstall",
          type: "guest-postinstall",
          name: `Post-install ${vm.name}`,
          params,
          dependsOn: [],
          timeoutMs: 3_600_000,
          maxRetries: 0,
        },
      ],
      globalParams: {},
      createdAt: new Date().toISOString(),
    };
    return this.execute(plan, options);
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async guestHost(): Promise<NodeTarget> {
    const { nodes } = await this.loadOutputs();
    const host = nodes[this.config.guests.hostNode - 1];
    if (!host) throw new LabError(`Guest host node ${this.config.guests.hostNode} does not exist`, "UNKNOWN_NODE");
    return host;
  }

  private expectedHost(): NodeTarget {
    const host = this.expectedNodes()[this.config.guests.hostNode - 1];
    if (!host) throw new LabError(`Guest host node ${this.config.guests.hostNode} does not exist`, "UNKNOWN_NODE");
    return host;
  }

  private async preflight(): Promise<void> {
    const bin = this.config.terraform.bin;
    const { installed, version } = await this.terraform.installed(bin);
    if (!installed) {
      throw new LabError(`terraform was not found (${bin}); install it or set terraform.bin`, "TERRAFORM_NOT_FOUND");
    }
    this.log.debug(`Using terraform ${version ?? "(unknown version)"}`);
  }

  private tfOptions(flags: { withPassword?: boolean } = {}): TfCliOptions {
    return {
      cwd: this.workingDir,
      terraformBin: this.config.terraform.bin,
      env: labTerraformEnv({
        adminPassword: flags.withPassword ? requireAdminPassword(this.config) : undefined,
        subscriptionId: this.config.azure.subscriptionId,
      }),
    };
  }

  private async readTerraformOutputs(opts: TfCliOptions): Promise<LabOutputs> {
    const result = ensureSuccess("output", await this.terraform.output(opts));
    return parseLabOutputs(result.json);
  }

  private async readState(): Promise<LabState | null> {
    if (!existsSync(this.statePath)) return null;
    const text = await readFile(this.statePath, "utf8");
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new LabError(`${this.statePath} is not valid JSON`, "INVALID_LAB_STATE", error);
    }
    const parsed = labStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LabError(`${this.statePath} is not a lab state file; run "s2dlab tf apply" again`, "INVALID_LAB_STATE");
    }
    return parsed.data;
  }

  private async saveState(outputs: LabOutputs): Promise<void> {
    const state: LabState = { savedAt: new Date().toISOString(), outputs };
    await writeFile(this.statePath, `${JSON.stringify(state, null, 2)}\n`, "utf8");
    this.log.debug(`Saved lab state to ${this.statePath}`);
  }

  private credentials(): LabCredentialsManager {
    this.cachedCredentials ??= createCredentialsManagerFromConfig(this.config);
    return this.cachedCredentials;
  }

  private retryOptions(): LabRetryOptions {
    const { retry } = this.config;
    return { maxAttempts: retry.maxAttempts, minDelayMs: retry.minDelayMs, maxDelayMs: retry.maxDelayMs };
  }

  private runner(): CommandRunner {
    this.cachedRunner ??= new AzureRunCommandRunner(this.credentials(), this.retryOptions());
    return this.cachedRunner;
  }

  private vms(): Pick<LabVMManager, "restartVM"> {
    this.cachedVms ??= new LabVMManager(this.credentials(), this.retryOptions());
    return this.cachedVms;
  }
}

