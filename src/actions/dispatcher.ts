import { failures, formatFailure, ScriptError, type ActionFailure } from "./errors.js";
import type { ScriptExecutor } from "./executor.js";
import { existsFrom, normalize, parseScalar } from "./normalizer.js";
import type { ActionEntry, ActionRegistry, Precheck } from "./registry.js";
import { ok, err, type ActionDefinition, type InputParameters, type NormalizedResult, type Result } from "./types.js";
import { validate, type ValidatedArguments } from "./validator.js";
import type { Logger } from "../logging/logger.js";

/**
 * What to do when an existence precheck itself cannot be answered:
 * `absent-on-error` proceeds as if the resource were missing, `strict`
 * fails the action.
 */
export type PrecheckPolicy = "absent-on-error" | "strict";

export type ActionOutcome =
  | { readonly ok: true; readonly action: string; readonly result: NormalizedResult }
  | { readonly ok: false; readonly action: string; readonly error: ActionFailure };

export type Stage = "lookup" | "validate" | "precheck" | "render" | "execute" | "normalize";

export interface ActionDispatcherOpts {
  registry: ActionRegistry;
  executor: ScriptExecutor;
  logger: Logger;
  precheckPolicy?: PrecheckPolicy;
}

export class ActionDispatcher {
  private readonly registry: ActionRegistry;
  private readonly executor: ScriptExecutor;
  private readonly logger: Logger;
  private readonly precheckPolicy: PrecheckPolicy;

  constructor(opts: ActionDispatcherOpts) {
    this.registry = opts.registry;
    this.executor = opts.executor;
    this.logger = opts.logger.child({ component: "dispatcher" });
    this.precheckPolicy = opts.precheckPolicy ?? "absent-on-error";
  }

  /**
   * Starts the executor's warm-up in the background. A warm-up that throws
   * or rejects is logged and otherwise ignored.
   */
  startWarmUp(): void {
    const { executor } = this;
    if (!executor.warmUp) return;
    void Promise.resolve()
      .then(() => executor.warmUp?.())
      .catch((e: unknown) => {
        this.logger.warn({ err: e }, "Warm-up failed");
      });
  }

  listActions(): string[] {
    return this.registry.listActions();
  }

  describeAction(name: string): ActionDefinition | undefined {
    return this.registry.describeAction(name);
  }

  /** Validates and renders without running anything. */
  render(name: string, input: InputParameters): Result<string, ActionFailure> {
    const entry = this.registry.get(name);
    if (!entry) return err(failures.actionNotFound(name));
    const args = validate(entry.definition, input);
    if (!args.ok) return args;
    return renderSafely(entry, args.value);
  }

  async execute(name: string, input: InputParameters): Promise<ActionOutcome> {
    const entry = this.registry.get(name);
    if (!entry) return this.fail(name, "lookup", failures.actionNotFound(name));

    const args = validate(entry.definition, input);
    if (!args.ok) return this.fail(name, "validate", args.error);

    if (entry.precheck) {
      const conflict = await this.runPrecheck(name, entry.precheck, args.value);
      if (conflict) return this.fail(name, "precheck", conflict);
    }

    const rendered = renderSafely(entry, args.value);
    if (!rendered.ok) return this.fail(name, "render", rendered.error);

    const executed = await this.executor.run(rendered.value);
    if (!executed.ok) return this.fail(name, "execute", executed.error);

    const normalized = normalize(entry.output, executed.value, args.value);
    if (!normalized.ok) return this.fail(name, "normalize", normalized.error);

    this.logger.debug({ action: name }, "Action succeeded");
    return { ok: true, action: name, result: normalized.value };
  }

  /** Resolves to a failure when the action must not proceed. */
  private async runPrecheck(
    name: string,
    precheck: Precheck,
    args: ValidatedArguments,
  ): Promise<ActionFailure | undefined> {
    let rendered: string;
    try {
      rendered = precheck.render(args);
    } catch (e) {
      if (e instanceof ScriptError) return failures.invalidArgument(e.message);
      throw e;
    }

    const outcome = await this.executor.run(rendered);
    let reason: string;
    if (!outcome.ok) {
      reason = outcome.error.message;
    } else if (!outcome.value.exitSucceeded) {
      reason = outcome.value.stderr.trim() || `exit ${outcome.value.exitCode}`;
    } else {
      const scalar = parseScalar(outcome.value.stdout);
      if (scalar) {
        return existsFrom(scalar) ? failures.precondition(precheck.conflict(args)) : undefined;
      }
      reason = `unreadable output: ${outcome.value.stdout.trim() || "<empty>"}`;
    }

    if (this.precheckPolicy === "strict") {
      return failures.precondition(`Existence check failed: ${reason}`);
    }
    this.logger.warn({ action: name, reason }, "Existence check failed, treating resource as absent");
    return undefined;
  }

  private fail(action: string, stage: Stage, error: ActionFailure): ActionOutcome {
    this.logger.warn({ action, stage, kind: error.kind }, formatFailure(error));
    return { ok: false, action, error };
  }
}

function renderSafely(entry: ActionEntry, args: ValidatedArguments): Result<string, ActionFailure> {
  try {
    return ok(entry.render(args));
  } catch (e) {
    if (e instanceof ScriptError) return err(failures.invalidArgument(e.message));
    throw e;
  }
}
