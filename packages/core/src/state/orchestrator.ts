import { randomUUID } from "node:crypto";
import type { Environment, EnvironmentCatalog } from "../config/environments.js";
import { DEFAULT_ORCHESTRATOR_SETTINGS, type OrchestratorSettings } from "../config/settings.js";
import type { PromotionEventEnvelope, PromotionEventType } from "../contracts/events.js";
import { MemoryRunStore } from "../db/memory-store.js";
import type { RunStore } from "../db/store.js";
import {
  CancelledError,
  ConflictError,
  InvalidStateError,
  OperationTimeoutError,
  RunNotFoundError,
  errorMessage
} from "../errors.js";
import { PromotionEventBus, type PromotionEventListener } from "../events/event-bus.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import { waitUntilReady } from "../monitor/readiness-poller.js";
import type {
  ApprovalStatus,
  ArtifactRegistry,
  ArtifactVersion,
  KnownGoodConfig,
  NotificationSink,
  ServingEndpointHandle,
  ServingResourceManager
} from "../platform/ports.js";
import { withRetry } from "../platform/retry.js";
import { evaluateGate } from "../statistics/evaluate-gate.js";
import {
  cancellationReason,
  throwIfCancelled,
  withTimeout,
  type LateOutcome
} from "../utils/async.js";
import { formatDuration } from "../utils/duration.js";
import { deepFreeze } from "../utils/freeze.js";
import type { ValidationReport } from "../validation/types.js";
import type { ValidationRunner } from "../validation/validator.js";
import { ApprovalWaiters, type ApprovalOutcome } from "./approvals.js";
import { isTerminalState, transitionRun } from "./machine.js";
import type {
  ApprovalRecord,
  PromotionRun,
  PromotionState,
  PromotionTrigger,
  TransitionRecord
} from "./types.js";

export interface SubmitPromotionInput {
  artifactId: string;
  environment: string;
  requestedBy?: string;
  trigger?: PromotionTrigger;
}

export interface EnvironmentStatus {
  environment: Environment;
  knownGood: KnownGoodConfig | null;
}

export interface PromotionOrchestratorDeps {
  registry: ArtifactRegistry;
  resources: ServingResourceManager;
  validator: ValidationRunner;
  environments: EnvironmentCatalog;
  store?: RunStore;
  bus?: PromotionEventBus;
  sinks?: NotificationSink[];
  settings?: Partial<OrchestratorSettings>;
  logger?: Logger;
  idFactory?: () => string;
  random?: () => number;
  /**
   * When false, submitted runs wait for explicit advance() calls instead of
   * being driven to completion by their own task.
   */
  autoRun?: boolean;
}

interface CallOptions<T> {
  environment: string;
  /** Epoch ms after which no attempt is started and running ones are cut off. */
  deadline: number;
  retry: boolean;
  /** Per-attempt bound; defaults to the orchestrator call timeout. */
  callTimeoutMs?: number;
  /** Cancellation interrupts backoff and refuses new attempts. */
  cancellable: boolean;
  onLateValue?: (value: T) => void;
}

type TransitionHook = (run: PromotionRun) => void;

/**
 * Owns every promotion run. Each run is driven by one task through the
 * transition table in machine.ts; operator calls (approve, reject, cancel)
 * only hand signals to that task and never write the run themselves.
 */
export class PromotionOrchestrator {
  private readonly registry: ArtifactRegistry;
  private readonly resources: ServingResourceManager;
  private readonly validator: ValidationRunner;
  private readonly environments: EnvironmentCatalog;
  private readonly store: RunStore;
  private readonly bus: PromotionEventBus;
  private readonly sinks: NotificationSink[];
  private readonly settings: OrchestratorSettings;
  private readonly log: Logger;
  private readonly idFactory: () => string;
  private readonly random: () => number;
  private readonly autoRun: boolean;

  private readonly runs = new Map<string, PromotionRun>();
  private readonly activeKeys = new Map<string, string>();
  private readonly tasks = new Map<string, Promise<void>>();
  private readonly controllers = new Map<string, AbortController>();
  private readonly stepping = new Map<string, Promise<PromotionRun>>();
  private readonly approvals = new ApprovalWaiters();
  private readonly knownGood = new Map<string, KnownGoodConfig>();

  constructor(deps: PromotionOrchestratorDeps) {
    this.registry = deps.registry;
    this.resources = deps.resources;
    this.validator = deps.validator;
    this.environments = deps.environments;
    this.store = deps.store ?? new MemoryRunStore();
    this.sinks = deps.sinks ?? [];
    this.settings = { ...DEFAULT_ORCHESTRATOR_SETTINGS, ...deps.settings };
    this.log = (deps.logger ?? rootLogger).child({ component: "orchestrator" });
    this.bus = deps.bus ?? new PromotionEventBus(deps.logger ?? rootLogger);
    this.idFactory = deps.idFactory ?? randomUUID;
    this.random = deps.random ?? Math.random;
    this.autoRun = deps.autoRun ?? true;
  }

  get eventBus(): PromotionEventBus {
    return this.bus;
  }

  submit(input: SubmitPromotionInput): PromotionRun {
    this.environments.get(input.environment);
    const key = activeKey(input.artifactId, input.environment);
    const holder = this.activeKeys.get(key);
    if (holder !== undefined) {
      throw new ConflictError(
        `Artifact ${input.artifactId} already has an active promotion to ${input.environment} (run ${holder})`,
        holder
      );
    }

    const legs = this.environments.legsFor(input.environment);
    const now = new Date().toISOString();
    const requestedBy = input.requestedBy ?? "unknown";
    const trigger = input.trigger ?? "manual";
    const record: TransitionRecord = {
      from: null,
      to: "REQUESTED",
      at: now,
      detail: `requested by ${requestedBy} (${trigger})`
    };
    const run: PromotionRun = {
      id: this.idFactory(),
      request: {
        artifactId: input.artifactId,
        environment: input.environment,
        requestedBy,
        requestedAt: now,
        trigger
      },
      state: "REQUESTED",
      legs,
      legIndex: 0,
      artifact: null,
      handle: null,
      history: [record],
      reports: [],
      latestReport: null,
      gates: [],
      approvals: [],
      inFlight: null,
      outstanding: [],
      outcome: null,
      createdAt: now,
      updatedAt: now,
      completedAt: null
    };

    this.activeKeys.set(key, run.id);
    this.runs.set(run.id, deepFreeze(run));
    this.controllers.set(run.id, new AbortController());
    this.persist(run, record);
    this.log.info("promotion submitted", {
      run_id: run.id,
      artifact_id: input.artifactId,
      environment: input.environment,
      legs
    });
    this.emit(run.id, "run_submitted", {
      artifact_id: input.artifactId,
      environment: input.environment,
      requested_by: requestedBy,
      trigger,
      legs
    });

    if (this.autoRun) {
      this.schedule(run.id);
    }
    return run;
  }

  /** Promotes the registry's newest APPROVED artifact, as an upstream build would. */
  async submitLatestApproved(environment: string, requestedBy = "build"): Promise<PromotionRun> {
    this.environments.get(environment);
    const findLatest = this.registry.findLatest?.bind(this.registry);
    if (!findLatest) {
      throw new InvalidStateError("Artifact registry cannot look up the latest approved artifact");
    }

    const artifact = await withTimeout(() => findLatest("APPROVED"), {
      operation: "findLatest",
      timeoutMs: this.settings.callTimeoutMs
    });
    if (!artifact) {
      throw new InvalidStateError(`No APPROVED artifact is available to promote to ${environment}`);
    }

    return this.submit({
      artifactId: artifact.id,
      environment,
      requestedBy,
      trigger: "build"
    });
  }

  getRun(runId: string): PromotionRun | null {
    return this.runs.get(runId) ?? this.store.getRun(runId);
  }

  listRuns(limit = 20): PromotionRun[] {
    return this.store.listRuns(limit).map((stored) => this.runs.get(stored.id) ?? stored);
  }

  getKnownGood(environment: string): KnownGoodConfig | null {
    return this.knownGood.get(environment) ?? null;
  }

  listEnvironments(): EnvironmentStatus[] {
    return this.environments.list().map((environment) => ({
      environment,
      knownGood: this.getKnownGood(environment.name)
    }));
  }

  subscribe(listener: PromotionEventListener): () => void {
    return this.bus.subscribe(listener);
  }

  /**
   * Drives exactly one transition. A terminal run is returned untouched and
   * concurrent calls for the same run share the step already in flight.
   */
  advance(runId: string): Promise<PromotionRun> {
    const run = this.requireRun(runId);
    if (isTerminalState(run.state)) {
      return Promise.resolve(run);
    }

    const inFlight = this.stepping.get(runId);
    if (inFlight) {
      return inFlight;
    }

    const step = this.step(run).finally(() => {
      this.stepping.delete(runId);
    });
    this.stepping.set(runId, step);
    return step;
  }

  approve(runId: string, approver: string, comment?: string): PromotionRun {
    const run = this.requireAwaitingApproval(runId);
    const accepted = this.approvals.resolve(runId, run.legIndex, {
      decision: "approved",
      by: approver,
      ...(comment !== undefined ? { note: comment } : {})
    });
    if (!accepted) {
      throw new InvalidStateError(
        `Run ${runId} already has an approval decision for ${this.legEnvironment(run)}`
      );
    }
    this.log.info("approval received", { run_id: runId, approver });
    return run;
  }

  reject(runId: string, approver: string, reason?: string): PromotionRun {
    const run = this.requireAwaitingApproval(runId);
    const accepted = this.approvals.resolve(runId, run.legIndex, {
      decision: "rejected",
      by: approver,
      ...(reason !== undefined ? { note: reason } : {})
    });
    if (!accepted) {
      throw new InvalidStateError(
        `Run ${runId} already has an approval decision for ${this.legEnvironment(run)}`
      );
    }
    this.log.info("rejection received", { run_id: runId, approver, reason });
    return run;
  }

  /** Takes effect at the run's next suspension point; a rollback is never interrupted. */
  cancel(runId: string, reason = "cancelled by operator"): PromotionRun {
    const run = this.requireRun(runId);
    if (isTerminalState(run.state) || run.state === "ROLLING_BACK") {
      return run;
    }
    const controller = this.controllers.get(runId);
    if (controller && !controller.signal.aborted) {
      controller.abort(reason);
      this.log.info("cancellation requested", { run_id: runId, state: run.state, reason });
    }
    return run;
  }

  waitForRun(runId: string): Promise<PromotionRun> {
    const run = this.requireRun(runId);
    if (isTerminalState(run.state)) {
      return Promise.resolve(run);
    }

    return new Promise((resolve) => {
      const unsubscribe = this.bus.subscribe((event) => {
        if (
          event.run_id === runId &&
          (event.type === "promotion_succeeded" || event.type === "promotion_failed")
        ) {
          unsubscribe();
          resolve(this.requireRun(runId));
        }
      });
    });
  }

  /**
   * Reloads known-good configurations and closes out runs a previous process
   * left unfinished. Their tasks are gone, so they cannot be resumed safely.
   */
  recover(): PromotionRun[] {
    for (const config of this.store.listKnownGood()) {
      this.knownGood.set(config.environment, freezeKnownGood(config));
    }

    const closed: PromotionRun[] = [];
    for (const stale of this.store.listActiveRuns()) {
      if (this.runs.has(stale.id)) continue;

      const pending = [
        ...(stale.inFlight ? [`${stale.inFlight.operation} on ${stale.inFlight.environment}`] : []),
        ...stale.outstanding
          .filter((entry) => entry.resolution === undefined)
          .map((entry) => `${entry.operation} on ${entry.environment}`)
      ];
      const suffix = pending.length > 0 ? `; unresolved calls: ${pending.join(", ")}` : "";
      const to: PromotionState = stale.state === "ROLLING_BACK" ? "ROLLBACK_FAILED" : "FAILED";

      this.runs.set(stale.id, stale);
      const next = this.commit(stale, to, `interrupted by restart in ${stale.state}${suffix}`, {
        inFlight: null
      });
      this.log.warn("closed interrupted run", { run_id: next.id, state: next.state });
      closed.push(next);
    }

    this.log.info("recovery complete", {
      known_good: this.knownGood.size,
      interrupted: closed.length
    });
    return closed;
  }

  async shutdown(): Promise<void> {
    for (const [runId, run] of this.runs) {
      if (!isTerminalState(run.state)) {
        this.cancel(runId, "orchestrator shutting down");
      }
    }
    await Promise.allSettled([...this.tasks.values()]);
  }

  private schedule(runId: string): void {
    const task = this.drive(runId)
      .catch((error: unknown) => {
        this.log.error("promotion task crashed", { run_id: runId, error: errorMessage(error) });
      })
      .finally(() => {
        this.tasks.delete(runId);
      });
    this.tasks.set(runId, task);
  }

  private async drive(runId: string): Promise<void> {
    while (true) {
      const before = this.requireRun(runId);
      if (isTerminalState(before.state)) {
        return;
      }

      try {
        const after = await this.advance(runId);
        if (after.history.length === before.history.length) {
          this.forceFail(runId, `no progress from ${before.state}`);
        }
      } catch (error) {
        this.log.error("promotion step raised", {
          run_id: runId,
          state: before.state,
          error: errorMessage(error)
        });
        this.forceFail(runId, `internal error in ${before.state}: ${errorMessage(error)}`);
      }
    }
  }

  private async step(run: PromotionRun): Promise<PromotionRun> {
    const signal = this.signalFor(run.id);
    if (signal.aborted && run.state !== "ROLLING_BACK") {
      return this.unwind(run, `cancelled: ${cancellationReason(signal)}`);
    }

    switch (run.state) {
      case "REQUESTED":
        return this.resolveArtifact(run);
      case "DEPLOYING":
        return this.deploy(run);
      case "AWAITING_READY":
        return this.awaitReady(run);
      case "VALIDATING":
        return this.validate(run);
      case "AWAITING_APPROVAL":
        return this.awaitApproval(run);
      case "ROLLING_BACK":
        return this.rollBack(run);
      default:
        return run;
    }
  }

  private async resolveArtifact(run: PromotionRun): Promise<PromotionRun> {
    const { artifactId } = run.request;
    let artifact: ArtifactVersion | null;
    try {
      artifact = await this.callResource(run.id, "getArtifact", () => this.registry.getArtifact(artifactId), {
        environment: run.request.environment,
        deadline: Date.now() + this.settings.callTimeoutMs,
        retry: true,
        cancellable: true
      });
    } catch (error) {
      const latest = this.requireRun(run.id);
      if (error instanceof CancelledError) {
        return this.commit(latest, "FAILED", `cancelled: ${error.message}`);
      }
      return this.commit(latest, "FAILED", `artifact lookup failed: ${errorMessage(error)}`);
    }

    const latest = this.requireRun(run.id);
    if (!artifact) {
      return this.commit(latest, "FAILED", `artifact ${artifactId} not found in registry`);
    }
    if (artifact.approvalStatus === "REJECTED") {
      return this.commit(latest, "FAILED", `artifact ${artifactId} is REJECTED in the registry`);
    }
    if (run.request.trigger === "build" && artifact.approvalStatus !== "APPROVED") {
      return this.commit(
        latest,
        "FAILED",
        `build-triggered promotion needs an APPROVED artifact; ${artifactId} is ${artifact.approvalStatus}`
      );
    }

    const first = run.legs[0] ?? run.request.environment;
    return this.commit(
      latest,
      "DEPLOYING",
      `deploying ${artifactId} to ${first}${legLabel(0, run.legs.length)}`,
      { artifact, legIndex: 0 }
    );
  }

  private async deploy(run: PromotionRun): Promise<PromotionRun> {
    const env = this.currentEnvironment(run);
    const artifact = run.artifact;
    if (!artifact) {
      return this.commit(run, "FAILED", "internal error: no artifact resolved before deploy");
    }

    try {
      const handle = await this.callResource(
        run.id,
        "deploy",
        () =>
          this.resources.deploy(artifact, {
            environment: env.name,
            tier: env.tier,
            resources: env.resources,
            monitoring: env.monitoring
          }),
        {
          environment: env.name,
          deadline: Date.now() + env.timeouts.deployMs,
          retry: true,
          cancellable: true,
          onLateValue: (late) => {
            this.discardLateHandle(run.id, late);
          }
        }
      );
      const withHandle = this.patchRun(run.id, { handle });
      throwIfCancelled(this.signalFor(run.id));
      return this.commit(
        withHandle,
        "AWAITING_READY",
        `deployed ${artifact.id} to ${env.name} as ${handle.id}`
      );
    } catch (error) {
      const latest = this.requireRun(run.id);
      if (error instanceof CancelledError) {
        return this.unwind(latest, `cancelled: ${error.message}`);
      }
      return this.failLeg(latest, `deploy to ${env.name} failed: ${errorMessage(error)}`);
    }
  }

  private async awaitReady(run: PromotionRun): Promise<PromotionRun> {
    const env = this.currentEnvironment(run);
    const handle = run.handle;
    if (!handle) {
      return this.failLeg(run, `internal error: no endpoint to watch in ${env.name}`);
    }

    try {
      const result = await waitUntilReady(this.resources, handle, {
        timeoutMs: env.timeouts.readyMs,
        intervalMs: this.settings.pollIntervalMs,
        callTimeoutMs: this.settings.callTimeoutMs,
        signal: this.signalFor(run.id),
        onPoll: ({ poll, status, error }) => {
          this.log.debug("readiness poll", { run_id: run.id, poll, status, error });
        }
      });

      const latest = this.requireRun(run.id);
      if (result.outcome === "READY") {
        return this.commit(latest, "VALIDATING", result.detail, {
          handle: { ...handle, status: "IN_SERVICE" }
        });
      }
      const label = result.outcome === "TIMED_OUT" ? "readiness timed out" : "endpoint failed";
      return this.failLeg(latest, `${label} in ${env.name}: ${result.detail}`);
    } catch (error) {
      const latest = this.requireRun(run.id);
      if (error instanceof CancelledError) {
        return this.unwind(latest, `cancelled: ${error.message}`);
      }
      return this.failLeg(latest, `readiness check in ${env.name} failed: ${errorMessage(error)}`);
    }
  }

  private async validate(run: PromotionRun): Promise<PromotionRun> {
    const env = this.currentEnvironment(run);
    const handle = run.handle;
    if (!handle) {
      return this.failLeg(run, `internal error: no endpoint to validate in ${env.name}`);
    }

    const signal = this.signalFor(run.id);
    const local = new AbortController();
    const forward = () => local.abort(signal.reason);
    signal.addEventListener("abort", forward, { once: true });

    let report: ValidationReport;
    try {
      report = await withTimeout(() => this.validator.run(handle, env.suite, local.signal), {
        operation: `validation suite '${env.suite.name}'`,
        timeoutMs: env.timeouts.validateMs,
        onTimeout: () => local.abort("validation timed out")
      });
      throwIfCancelled(signal);
    } catch (error) {
      const latest = this.requireRun(run.id);
      if (error instanceof CancelledError && signal.aborted) {
        return this.unwind(latest, `cancelled: ${error.message}`);
      }
      return this.failLeg(latest, `validation in ${env.name} failed: ${errorMessage(error)}`);
    } finally {
      signal.removeEventListener("abort", forward);
    }

    const gate = evaluateGate(report, env.policy, { approvedBy: this.approvedBy(run, env.name) });
    const current = this.requireRun(run.id);
    const validated = this.patchRun(run.id, {
      reports: [...current.reports, report],
      latestReport: report,
      gates: [
        ...current.gates,
        { environment: env.name, decision: gate.decision, reason: gate.reason, at: new Date().toISOString() }
      ]
    });

    this.log.info("validation completed", {
      run_id: run.id,
      environment: env.name,
      passed: report.passed,
      decision: gate.decision
    });
    this.emit(run.id, "validation_completed", {
      environment: env.name,
      artifact_id: run.request.artifactId,
      passed: report.passed,
      decision: gate.decision,
      reason: gate.reason,
      violations: gate.violations,
      metrics: report.metrics
    });

    switch (gate.decision) {
      case "ALLOW":
        return this.completeLeg(validated, gate.reason);
      case "BLOCK":
        await this.markArtifact(run.id, run.request.artifactId, "REJECTED", gate.reason);
        return this.failLeg(this.requireRun(run.id), `gate blocked in ${env.name}: ${gate.reason}`);
      case "NEEDS_APPROVAL":
        return this.commit(validated, "AWAITING_APPROVAL", gate.reason, {}, (next) => {
          this.emit(next.id, "approval_requested", {
            environment: env.name,
            artifact_id: next.request.artifactId,
            reason: gate.reason,
            report
          });
        });
    }
  }

  private async awaitApproval(run: PromotionRun): Promise<PromotionRun> {
    const env = this.currentEnvironment(run);
    let outcome: ApprovalOutcome;
    try {
      outcome = await this.approvals.wait(
        run.id,
        run.legIndex,
        env.timeouts.approvalMs,
        this.signalFor(run.id)
      );
    } catch (error) {
      if (error instanceof CancelledError) {
        return this.unwind(this.requireRun(run.id), `cancelled: ${error.message}`);
      }
      throw error;
    }

    if (outcome.decision === "timeout") {
      return this.unwind(
        this.requireRun(run.id),
        `approval for ${env.name} timed out after ${formatDuration(env.timeouts.approvalMs)}`
      );
    }

    const record: ApprovalRecord = {
      environment: env.name,
      decision: outcome.decision,
      by: outcome.by,
      at: new Date().toISOString(),
      ...(outcome.note !== undefined ? { note: outcome.note } : {})
    };
    const current = this.requireRun(run.id);
    const decided = this.patchRun(run.id, { approvals: [...current.approvals, record] });

    if (outcome.decision === "rejected") {
      const why = outcome.note ? `: ${outcome.note}` : "";
      await this.markArtifact(run.id, run.request.artifactId, "REJECTED", `rejected by ${outcome.by}${why}`);
      return this.unwind(this.requireRun(run.id), `rejected by ${outcome.by}${why}`);
    }

    const report = decided.latestReport;
    if (!report) {
      return this.unwind(decided, "internal error: approval without a validation report");
    }
    const gate = evaluateGate(report, env.policy, { approvedBy: outcome.by });
    if (gate.decision !== "ALLOW") {
      return this.unwind(decided, `gate re-evaluation after approval: ${gate.reason}`);
    }
    return this.completeLeg(decided, gate.reason);
  }

  private async rollBack(run: PromotionRun): Promise<PromotionRun> {
    const environment = this.legEnvironment(run);
    const prior = this.knownGood.get(environment);
    if (!prior) {
      return this.commit(run, "ROLLBACK_FAILED", `no known-good configuration for ${environment}`);
    }

    const restored = await this.restoreKnownGood(run, prior);
    const latest = this.requireRun(run.id);
    if (restored.ok) {
      return this.commit(
        latest,
        "ROLLED_BACK",
        `restored ${prior.artifactId} in ${environment}`,
        { handle: restored.handle },
        (next) => {
          this.emit(next.id, "rolled_back", {
            environment,
            artifact_id: prior.artifactId,
            detail: next.outcome?.detail ?? ""
          });
        }
      );
    }

    return this.commit(
      latest,
      "ROLLBACK_FAILED",
      `restore of ${prior.artifactId} in ${environment} failed: ${restored.error}; manual intervention required`,
      {},
      (next) => this.emitRollbackFailed(next, environment, prior, restored.error)
    );
  }

  private completeLeg(run: PromotionRun, reason: string): Promise<PromotionRun> {
    const nextIndex = run.legIndex + 1;
    const nextLeg = run.legs[nextIndex];
    if (nextLeg === undefined) {
      return this.promote(run, reason);
    }
    return Promise.resolve(
      this.commit(
        run,
        "DEPLOYING",
        `${reason}; deploying to ${nextLeg}${legLabel(nextIndex, run.legs.length)}`,
        { legIndex: nextIndex, handle: null }
      )
    );
  }

  private async promote(run: PromotionRun, reason: string): Promise<PromotionRun> {
    const env = this.currentEnvironment(run);
    const handle = run.handle;
    if (!handle) {
      return this.unwind(run, `internal error: nothing deployed in ${env.name} to promote`);
    }

    const config = freezeKnownGood({
      environment: env.name,
      artifactId: run.request.artifactId,
      handle,
      resources: env.resources,
      runId: run.id,
      promotedAt: new Date().toISOString()
    });
    this.knownGood.set(env.name, config);
    try {
      this.store.saveKnownGood(config);
    } catch (error) {
      this.log.error("failed to persist known-good configuration", {
        run_id: run.id,
        environment: env.name,
        error: errorMessage(error)
      });
    }

    const monitoring = await this.configureMonitoring(run.id, env, handle);
    await this.markArtifact(run.id, run.request.artifactId, "APPROVED", `promoted to ${env.name}`);
    return this.commit(
      this.requireRun(run.id),
      "PROMOTED",
      `promoted ${run.request.artifactId} to ${env.name}: ${reason}${monitoring}`
    );
  }

  /**
   * Schedules monitoring over a newly promoted endpoint. The model already
   * passed its gate, so a failure here is reported on the run but does not
   * undo the promotion. Returns a detail suffix.
   */
  private async configureMonitoring(
    runId: string,
    env: Environment,
    handle: ServingEndpointHandle
  ): Promise<string> {
    if (!env.monitoring.enabled) {
      return "";
    }

    try {
      await this.callResource(
        runId,
        "configureMonitoring",
        () => this.resources.configureMonitoring(handle, env.monitoring),
        {
          environment: env.name,
          deadline: Date.now() + this.settings.callTimeoutMs,
          retry: true,
          cancellable: false
        }
      );
      this.log.info("monitoring configured", {
        run_id: runId,
        environment: env.name,
        schedule: env.monitoring.schedule,
        sampling_percentage: env.monitoring.captureSamplingPercentage
      });
      return "";
    } catch (error) {
      this.log.warn("failed to configure monitoring", {
        run_id: runId,
        environment: env.name,
        endpoint: handle.id,
        error: errorMessage(error)
      });
      return `; monitoring setup failed: ${errorMessage(error)}`;
    }
  }

  /** Failure with rollback evaluation: restore a known-good config or clean up. */
  private async failLeg(run: PromotionRun, cause: string): Promise<PromotionRun> {
    const environment = this.legEnvironment(run);
    const prior = this.knownGood.get(environment);
    if (prior) {
      return this.commit(run, "ROLLING_BACK", cause, {}, (next) => {
        this.emit(next.id, "rollback_started", {
          environment,
          artifact_id: prior.artifactId,
          cause
        });
      });
    }

    const cleanup = await this.discardHandle(run);
    return this.commit(this.requireRun(run.id), "FAILED", `${cause}${cleanup}`);
  }

  /**
   * Used for rejection, approval timeout and cancellation: puts the leg
   * environment back the way the run found it, then ends the run.
   */
  private async unwind(run: PromotionRun, detail: string): Promise<PromotionRun> {
    if (!run.handle) {
      return this.commit(run, "FAILED", detail);
    }

    const environment = this.legEnvironment(run);
    const prior = this.knownGood.get(environment);
    if (!prior) {
      const cleanup = await this.discardHandle(run);
      return this.commit(this.requireRun(run.id), "FAILED", `${detail}${cleanup}`);
    }

    this.emit(run.id, "rollback_started", { environment, artifact_id: prior.artifactId, cause: detail });
    const restored = await this.restoreKnownGood(run, prior);
    const latest = this.requireRun(run.id);
    if (restored.ok) {
      this.emit(run.id, "rolled_back", { environment, artifact_id: prior.artifactId, detail });
      return this.commit(latest, "FAILED", `${detail}; restored ${prior.artifactId} in ${environment}`, {
        handle: restored.handle
      });
    }

    return this.commit(
      latest,
      "ROLLBACK_FAILED",
      `${detail}; restore of ${prior.artifactId} in ${environment} failed: ${restored.error}; manual intervention required`,
      {},
      (next) => this.emitRollbackFailed(next, environment, prior, restored.error)
    );
  }

  private async restoreKnownGood(
    run: PromotionRun,
    prior: KnownGoodConfig
  ): Promise<{ ok: true; handle: ServingEndpointHandle } | { ok: false; error: string }> {
    const env = this.environments.get(prior.environment);
    try {
      const handle = await this.callResource(
        run.id,
        "restore",
        () => this.resources.restore(prior.environment, prior),
        {
          environment: prior.environment,
          deadline: Date.now() + env.timeouts.restoreMs,
          callTimeoutMs: env.timeouts.restoreMs,
          retry: false,
          cancellable: false
        }
      );
      return { ok: true, handle };
    } catch (error) {
      this.log.error("rollback failed; manual intervention required", {
        run_id: run.id,
        environment: prior.environment,
        known_good: prior.artifactId,
        error: errorMessage(error)
      });
      return { ok: false, error: errorMessage(error) };
    }
  }

  /** Deletes the endpoint this run created; returns a detail suffix. */
  private async discardHandle(run: PromotionRun): Promise<string> {
    const handle = run.handle;
    if (!handle) {
      return "";
    }

    try {
      await this.callResource(run.id, "delete", () => this.resources.delete(handle), {
        environment: handle.environment,
        deadline: Date.now() + this.settings.callTimeoutMs,
        retry: true,
        cancellable: false
      });
      this.patchRun(run.id, { handle: null });
      return `; deleted ${handle.id}`;
    } catch (error) {
      this.log.error("failed to delete endpoint", {
        run_id: run.id,
        endpoint: handle.id,
        error: errorMessage(error)
      });
      return `; cleanup of ${handle.id} failed: ${errorMessage(error)}`;
    }
  }

  private discardLateHandle(runId: string, handle: ServingEndpointHandle): void {
    this.log.warn("deploy completed after its deadline; deleting the late endpoint", {
      run_id: runId,
      endpoint: handle.id
    });
    void this.resources.delete(handle).catch((error: unknown) => {
      this.log.error("failed to delete late endpoint", {
        run_id: runId,
        endpoint: handle.id,
        error: errorMessage(error)
      });
    });
  }

  private async markArtifact(
    runId: string,
    artifactId: string,
    status: ApprovalStatus,
    note: string
  ): Promise<void> {
    try {
      await withRetry(
        () =>
          withTimeout(() => this.registry.setApprovalStatus(artifactId, status, note), {
            operation: "setApprovalStatus",
            timeoutMs: this.settings.callTimeoutMs
          }),
        { policy: this.settings.retry, random: this.random }
      );
    } catch (error) {
      this.log.error("failed to update artifact approval status", {
        run_id: runId,
        artifact_id: artifactId,
        status,
        error: errorMessage(error)
      });
    }
  }

  /**
   * One collaborator call: retried when transient, each attempt bounded, the
   * attempt in flight recorded on the run and an abandoned one kept in
   * `outstanding` until it settles.
   */
  private callResource<T>(
    runId: string,
    operation: string,
    call: () => Promise<T>,
    options: CallOptions<T>
  ): Promise<T> {
    const signal = options.cancellable ? this.signalFor(runId) : undefined;
    const perCall = options.callTimeoutMs ?? this.settings.callTimeoutMs;

    const attempt = async (): Promise<T> => {
      throwIfCancelled(signal);
      const remaining = options.deadline - Date.now();
      if (remaining <= 0) {
        throw new OperationTimeoutError(operation, perCall);
      }

      const startedAt = new Date().toISOString();
      this.patchRun(runId, { inFlight: { operation, environment: options.environment, startedAt } });
      try {
        return await withTimeout(call, {
          operation,
          timeoutMs: Math.min(perCall, remaining),
          onTimeout: () => this.recordAbandoned(runId, operation, options.environment, startedAt),
          onLateSettle: (outcome) => {
            this.resolveAbandoned(runId, operation, startedAt, outcome);
            if (outcome.status === "fulfilled") {
              options.onLateValue?.(outcome.value);
            }
          }
        });
      } finally {
        this.patchRun(runId, { inFlight: null });
      }
    };

    if (!options.retry) {
      return attempt();
    }

    return withRetry(attempt, {
      policy: this.settings.retry,
      deadline: options.deadline,
      random: this.random,
      ...(signal ? { signal } : {}),
      onRetry: ({ attempt: attemptNumber, delayMs, error }) => {
        this.log.warn("transient collaborator error; retrying", {
          run_id: runId,
          operation,
          attempt: attemptNumber,
          delay_ms: delayMs,
          error: errorMessage(error)
        });
      }
    });
  }

  private recordAbandoned(runId: string, operation: string, environment: string, startedAt: string): void {
    const run = this.requireRun(runId);
    this.patchRun(runId, {
      outstanding: [
        ...run.outstanding,
        { operation, environment, startedAt, abandonedAt: new Date().toISOString() }
      ]
    });
    this.log.warn("collaborator call abandoned after timeout", { run_id: runId, operation, environment });
  }

  private resolveAbandoned<T>(
    runId: string,
    operation: string,
    startedAt: string,
    outcome: LateOutcome<T>
  ): void {
    const resolution =
      outcome.status === "fulfilled"
        ? "completed after deadline"
        : `failed after deadline: ${errorMessage(outcome.error)}`;
    const run = this.requireRun(runId);
    this.patchRun(runId, {
      outstanding: run.outstanding.map((entry) =>
        entry.operation === operation && entry.startedAt === startedAt ? { ...entry, resolution } : entry
      )
    });
    this.log.warn("abandoned collaborator call settled", { run_id: runId, operation, resolution });
  }

  private emitRollbackFailed(
    run: PromotionRun,
    environment: string,
    prior: KnownGoodConfig,
    error: string
  ): void {
    this.emit(run.id, "rollback_failed", {
      environment,
      artifact_id: prior.artifactId,
      error,
      detail: run.outcome?.detail ?? ""
    });
  }

  private commit(
    run: PromotionRun,
    to: PromotionState,
    detail: string,
    patch: Partial<PromotionRun> = {},
    afterTransition?: TransitionHook
  ): PromotionRun {
    const at = new Date().toISOString();
    const next = transitionRun(run, to, detail, patch, at);
    const record: TransitionRecord = { from: run.state, to, at, detail };
    this.runs.set(next.id, next);
    this.persist(next, record);
    if (run.state === "AWAITING_APPROVAL") {
      this.approvals.close(run.id, run.legIndex);
    }

    this.log.info("run transition", {
      run_id: next.id,
      from: run.state,
      to,
      environment: this.legEnvironment(next),
      detail
    });
    this.emit(next.id, "transition", {
      from: run.state,
      to,
      detail,
      environment: this.legEnvironment(next),
      artifact_id: next.request.artifactId
    });
    afterTransition?.(next);

    if (isTerminalState(to)) {
      this.finish(next);
    }
    return next;
  }

  private finish(run: PromotionRun): void {
    const key = activeKey(run.request.artifactId, run.request.environment);
    if (this.activeKeys.get(key) === run.id) {
      this.activeKeys.delete(key);
    }
    this.controllers.delete(run.id);
    this.approvals.discard(run.id);

    this.emit(run.id, run.state === "PROMOTED" ? "promotion_succeeded" : "promotion_failed", {
      environment: run.request.environment,
      artifact_id: run.request.artifactId,
      state: run.state,
      detail: run.outcome?.detail ?? ""
    });
  }

  private forceFail(runId: string, detail: string): void {
    const run = this.requireRun(runId);
    if (isTerminalState(run.state)) return;
    this.commit(run, run.state === "ROLLING_BACK" ? "ROLLBACK_FAILED" : "FAILED", detail);
  }

  private patchRun(runId: string, patch: Partial<PromotionRun>): PromotionRun {
    const next: PromotionRun = deepFreeze({
      ...this.requireRun(runId),
      ...patch,
      updatedAt: new Date().toISOString()
    });
    this.runs.set(runId, next);
    this.persist(next);
    return next;
  }

  private persist(run: PromotionRun, record?: TransitionRecord): void {
    try {
      this.store.saveRun(run);
      if (record) {
        this.store.recordTransition(run.id, record);
      }
    } catch (error) {
      this.log.error("failed to persist run", { run_id: run.id, error: errorMessage(error) });
    }
  }

  private emit<T>(runId: string, type: PromotionEventType, data: T): void {
    const event: PromotionEventEnvelope<T> = {
      type,
      timestamp: new Date().toISOString(),
      run_id: runId,
      data
    };

    try {
      this.store.recordEvent(event);
    } catch (error) {
      this.log.error("failed to persist event", { run_id: runId, type, error: errorMessage(error) });
    }
    this.bus.emitEvent(event);

    for (const sink of this.sinks) {
      void Promise.resolve()
        .then(() => sink.notify(event))
        .catch((error: unknown) => {
          this.log.warn("notification sink failed", { run_id: runId, type, error: errorMessage(error) });
        });
    }
  }

  private approvedBy(run: PromotionRun, environment: string): string | null {
    const approval = run.approvals.find(
      (entry) => entry.environment === environment && entry.decision === "approved"
    );
    return approval?.by ?? null;
  }

  private requireAwaitingApproval(runId: string): PromotionRun {
    const run = this.requireRun(runId);
    if (run.state !== "AWAITING_APPROVAL") {
      throw new InvalidStateError(`Run ${runId} is ${run.state}, not AWAITING_APPROVAL`);
    }
    return run;
  }

  private requireRun(runId: string): PromotionRun {
    const run = this.getRun(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    return run;
  }

  private signalFor(runId: string): AbortSignal {
    let controller = this.controllers.get(runId);
    if (!controller) {
      controller = new AbortController();
      this.controllers.set(runId, controller);
    }
    return controller.signal;
  }

  private legEnvironment(run: PromotionRun): string {
    return run.legs[run.legIndex] ?? run.request.environment;
  }

  private currentEnvironment(run: PromotionRun): Environment {
    return this.environments.get(this.legEnvironment(run));
  }
}

function activeKey(artifactId: string, environment: string): string {
  return `${artifactId}::${environment}`;
}

function legLabel(index: number, total: number): string {
  return total > 1 ? ` (leg ${index + 1}/${total})` : "";
}

function freezeKnownGood(config: KnownGoodConfig): KnownGoodConfig {
  return Object.freeze({
    ...config,
    handle: Object.freeze({ ...config.handle }),
    resources: Object.freeze({
      ...config.resources,
      autoscaling: Object.freeze({ ...config.resources.autoscaling })
    })
  });
}
