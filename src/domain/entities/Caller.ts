import { AppError } from '../errors/AppError';

export enum Capability {
  ORACLE = 'ORACLE',
  ADMIN = 'ADMIN'
}

export enum PolicyOperation {
  CREATE_POLICY = 'createPolicy',
  UPDATE_FLIGHT_INFO = 'updateFlightInfo',
  EVALUATE = 'evaluate',
  WITHDRAW_ALL = 'withdrawAll'
}

/**
 * Capabilities accepted per operation. An empty list means any
 * authenticated caller may perform it.
 */
export const REQUIRED_CAPABILITIES: Readonly<Record<PolicyOperation, readonly Capability[]>> = {
  [PolicyOperation.CREATE_POLICY]: [],
  [PolicyOperation.UPDATE_FLIGHT_INFO]: [Capability.ORACLE, Capability.ADMIN],
  [PolicyOperation.EVALUATE]: [Capability.ADMIN],
  [PolicyOperation.WITHDRAW_ALL]: [Capability.ADMIN]
};

const CAPABILITY_VALUES: readonly string[] = Object.values(Capability);

export function isCapability(value: unknown): value is Capability {
  return typeof value === 'string' && CAPABILITY_VALUES.includes(value);
}

export class Caller {
  public readonly capabilities: ReadonlySet<Capability>;

  constructor(
    public readonly id: string,
    capabilities: Iterable<Capability> = []
  ) {
    this.capabilities = new Set(capabilities);
  }

  /** Identity used by the in-process evaluation monitor. */
  static system(): Caller {
    return new Caller('system:monitor', [Capability.ADMIN]);
  }

  has(capability: Capability): boolean {
    return this.capabilities.has(capability);
  }

  canPerform(operation: PolicyOperation): boolean {
    const required = REQUIRED_CAPABILITIES[operation];
    return required.length === 0 || required.some(capability => this.has(capability));
  }
}

export function assertAuthorized(caller: Caller, operation: PolicyOperation): void {
  if (!caller.canPerform(operation)) {
    throw AppError.missingCapability(operation);
  }
}
