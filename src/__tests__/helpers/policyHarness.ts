import { IClock } from '../../domain/services/IClock';
import { Caller, Capability } from '../../domain/entities/Caller';
import { ClaimOutcome, Policy, PolicyStatus } from '../../domain/entities/Policy';
import { InsuranceConfig, loadInsuranceConfig } from '../../config/insuranceConfig';
import { InMemoryPolicyRepository } from '../../infrastructure/repositories/InMemoryPolicyRepository';
import { InMemorySettlementGateway } from '../../infrastructure/settlement/InMemorySettlementGateway';
import { PolicyLockRegistry } from '../../infrastructure/coordination/PolicyLockRegistry';
import { PolicyEventEmitter } from '../../infrastructure/events/PolicyEventEmitter';
import { PurchasePolicyUseCase } from '../../application/useCases/PurchasePolicyUseCase';
import { UpdateFlightInfoUseCase } from '../../application/useCases/UpdateFlightInfoUseCase';
import { EvaluateClaimUseCase } from '../../application/useCases/EvaluateClaimUseCase';
import { QueryPoliciesUseCase } from '../../application/useCases/QueryPoliciesUseCase';
import { WithdrawFundsUseCase } from '../../application/useCases/WithdrawFundsUseCase';
import { MonitorPoliciesUseCase } from '../../application/useCases/MonitorPoliciesUseCase';

export class FixedClock implements IClock {
  constructor(public current: number) {}

  now(): number {
    return this.current;
  }
}

export const ONE_ETHER = 1000000000000000000n;
export const PREMIUM = 10000000000000000n;
export const CLAIM_AMOUNT = 50000000000000000n;

export const ADMIN = new Caller('admin-1', [Capability.ADMIN]);
export const ORACLE = new Caller('oracle-1', [Capability.ORACLE]);
export const HOLDER = new Caller('holder-1');

export interface PolicyHarness {
  config: InsuranceConfig;
  clock: FixedClock;
  repository: InMemoryPolicyRepository;
  gateway: InMemorySettlementGateway;
  locks: PolicyLockRegistry;
  events: PolicyEventEmitter;
  purchase: PurchasePolicyUseCase;
  updateFlightInfo: UpdateFlightInfoUseCase;
  evaluate: EvaluateClaimUseCase;
  query: QueryPoliciesUseCase;
  withdraw: WithdrawFundsUseCase;
  monitor: MonitorPoliciesUseCase;
}

export function createHarness(options: { float?: bigint; now?: number } = {}): PolicyHarness {
  const config = loadInsuranceConfig({});
  const clock = new FixedClock(options.now ?? 500);
  const repository = new InMemoryPolicyRepository();
  const gateway = new InMemorySettlementGateway(options.float ?? ONE_ETHER);
  const locks = new PolicyLockRegistry();
  const events = new PolicyEventEmitter();
  const evaluate = new EvaluateClaimUseCase(repository, gateway, clock, locks, events);

  return {
    config,
    clock,
    repository,
    gateway,
    locks,
    events,
    purchase: new PurchasePolicyUseCase(repository, config, gateway, clock, locks, events),
    updateFlightInfo: new UpdateFlightInfoUseCase(repository, clock, locks, events),
    evaluate,
    query: new QueryPoliciesUseCase(repository, events),
    withdraw: new WithdrawFundsUseCase(gateway, events),
    monitor: new MonitorPoliciesUseCase(repository, evaluate, clock)
  };
}

/** Opens a policy departing at 1000 and arriving at 2000. */
export function openStandardPolicy(harness: PolicyHarness, holder = 'holder-1'): Promise<Policy> {
  return harness.purchase.execute({
    caller: HOLDER,
    holder,
    flightCode: 'KE123',
    scheduledDeparture: 1000,
    scheduledArrival: 2000,
    paidAmount: PREMIUM
  });
}

export function outcomeMatchesStatus(policy: Policy): boolean {
  return (policy.claimOutcome === ClaimOutcome.NONE) === (policy.policyStatus === PolicyStatus.ACTIVE);
}
