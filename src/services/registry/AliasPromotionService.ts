import type { AliasBinding, AliasExpectation, IModelRegistry, ModelVersion } from '../../types/RegistryTypes';
import type { GateDecision, IGateDecisionStore } from '../../types/EvaluationTypes';
import { ILedgerService, LedgerEventType } from '../../types/LedgerTypes';
import {
  AliasNotFoundError,
  ConfigError,
  PromotionRejectedError,
  RegistryConflictError,
} from '../../types/ModelGateErrors';
import { Logger } from '../core/Logger';

export interface AssignAliasRequest {
  modelName: string;
  alias: string;
  version: number;
  actor: string;
}

export interface PromoteRequest {
  modelName: string;
  version: number;
  alias: string;
  /** Fingerprint of the promotion policy in force */
  policyFingerprint: string;
  /** Bypass the gate; the reason is recorded with the binding and in the ledger */
  override?: { reason: string };
  /** Version the alias must currently bind; defaults to the binding read at the start of the call */
  expectedVersion?: number;
  actor: string;
}

export interface RemoveAliasRequest {
  modelName: string;
  alias: string;
  expectedVersion?: number;
  actor: string;
}

export interface PromotionOutcome {
  binding: AliasBinding;
  /** The passing decision that allowed the promotion; absent for overrides */
  decision?: GateDecision;
}

function requireName(name: string, value: string): void {
  if (!value || !value.trim()) {
    throw new ConfigError(`${name} is required`);
  }
}

function requireVersion(version: number): void {
  if (!Number.isInteger(version) || version < 1) {
    throw new ConfigError(`version must be a positive integer (got ${version})`);
  }
}

/**
 * AliasPromotionService - the alias state machine
 *
 * unbound ──assignAlias──► bound(v)            ungated, only from unbound
 * unbound | bound(u) ──promote──► bound(v)     requires a passing decision under the policy
 *                                              in force, or an explicit override
 * bound(v) ──removeAlias──► unbound
 *
 * Every transition is one compare-and-swap in the registry; a rejected or lost transition
 * leaves the alias exactly as it was.
 */
export class AliasPromotionService {
  constructor(
    private registry: IModelRegistry,
    private decisionStore: Pick<IGateDecisionStore, 'getLatestDecision'>,
    private ledgerService: ILedgerService,
    private logger: Logger
  ) {}

  async assignAlias(request: AssignAliasRequest): Promise<AliasBinding> {
    const { modelName, alias, version } = request;
    requireName('model name', modelName);
    requireName('alias', alias);
    requireVersion(version);

    await this.registry.getVersionInfo(modelName, version);
    const current = await this.registry.getAlias(modelName, alias);
    if (current) {
      throw new RegistryConflictError(
        `Alias '${alias}' of ${modelName} already binds v${current.version}; use promote to rebind it`
      );
    }

    const binding = await this.registry.compareAndSetAlias({
      modelName,
      alias,
      version,
      expected: { state: 'unbound' },
      mode: 'ASSIGNED',
      actor: request.actor,
    });

    await this.ledgerService.append({
      subjectType: 'MODEL',
      subjectId: modelName,
      eventType: LedgerEventType.ALIAS_ASSIGNED,
      actor: request.actor,
      data: { alias, version },
    });

    return binding;
  }

  async promote(request: PromoteRequest): Promise<PromotionOutcome> {
    const { modelName, alias, version } = request;
    requireName('model name', modelName);
    requireName('alias', alias);
    requireVersion(version);
    if (request.override && !request.override.reason.trim()) {
      throw new ConfigError('An override requires a reason');
    }

    const target = await this.registry.getVersionInfo(modelName, version);
    const current = await this.registry.getAlias(modelName, alias);
    const expected: AliasExpectation =
      request.expectedVersion !== undefined
        ? { state: 'bound', version: request.expectedVersion }
        : current
          ? { state: 'bound', version: current.version }
          : { state: 'unbound' };

    let decision: GateDecision | undefined;
    if (!request.override) {
      decision = await this.requirePassingDecision(request, target);
    }

    const binding = await this.registry.compareAndSetAlias({
      modelName,
      alias,
      version,
      expected,
      mode: request.override ? 'OVERRIDE' : 'GATED',
      actor: request.actor,
      ...(decision ? { decisionId: decision.decision_id } : {}),
      ...(request.override ? { auditReason: request.override.reason } : {}),
    });

    await this.ledgerService.append({
      subjectType: 'MODEL',
      subjectId: modelName,
      eventType: LedgerEventType.ALIAS_PROMOTED,
      actor: request.actor,
      data: {
        alias,
        version,
        previous_version: expected.state === 'bound' ? expected.version : null,
        mode: binding.mode,
        decision_id: decision?.decision_id ?? null,
        policy_fingerprint: request.policyFingerprint,
        override_reason: request.override?.reason ?? null,
      },
    });

    if (request.override) {
      this.logger.warn('Alias promoted by override', { modelName, alias, version, reason: request.override.reason });
    } else {
      this.logger.info('Alias promoted', { modelName, alias, version });
    }

    return { binding, ...(decision ? { decision } : {}) };
  }

  async removeAlias(request: RemoveAliasRequest): Promise<void> {
    const { modelName, alias } = request;
    requireName('model name', modelName);
    requireName('alias', alias);

    const current = await this.registry.getAlias(modelName, alias);
    if (!current) {
      throw new AliasNotFoundError(modelName, alias);
    }

    const expectedVersion = request.expectedVersion ?? current.version;
    await this.registry.deleteAlias({ modelName, alias, expectedVersion });

    await this.ledgerService.append({
      subjectType: 'MODEL',
      subjectId: modelName,
      eventType: LedgerEventType.ALIAS_REMOVED,
      actor: request.actor,
      data: { alias, version: expectedVersion },
    });
  }

  async resolveAlias(modelName: string, alias: string): Promise<ModelVersion> {
    const binding = await this.registry.getAlias(modelName, alias);
    if (!binding) {
      throw new AliasNotFoundError(modelName, alias);
    }
    return this.registry.getVersionInfo(modelName, binding.version);
  }

  /**
   * The latest decision for the version's run under the policy in force must pass
   */
  private async requirePassingDecision(request: PromoteRequest, target: ModelVersion): Promise<GateDecision> {
    const decision = await this.decisionStore.getLatestDecision(target.run_id, request.policyFingerprint);

    if (decision && decision.passed) {
      return decision;
    }

    const reasons = decision
      ? decision.reasons.map((reason) => reason.message)
      : [`no gate decision recorded for run ${target.run_id} under policy ${request.policyFingerprint}`];

    await this.ledgerService.append({
      subjectType: 'MODEL',
      subjectId: request.modelName,
      eventType: LedgerEventType.PROMOTION_REJECTED,
      actor: request.actor,
      data: {
        alias: request.alias,
        version: request.version,
        decision_id: decision?.decision_id ?? null,
        policy_fingerprint: request.policyFingerprint,
        reasons,
      },
    });

    this.logger.warn('Promotion rejected by gate', {
      modelName: request.modelName,
      alias: request.alias,
      version: request.version,
      reasons,
    });
    throw new PromotionRejectedError(request.modelName, request.version, request.alias, reasons);
  }
}
