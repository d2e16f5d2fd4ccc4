export enum ErrorKind {
  ConfigNotFound = 'ConfigNotFound',
  RemoteUnavailable = 'RemoteUnavailable',
  MalformedResponse = 'MalformedResponse',
  RpcApplicationError = 'RpcApplicationError',
  PayloadTooShort = 'PayloadTooShort',
  PayloadIntegrity = 'PayloadIntegrity',
  PeerNotFound = 'PeerNotFound',
  OperationNotAllowed = 'OperationNotAllowed',
  UnknownSourceChain = 'UnknownSourceChain',
  InvalidRpcUrl = 'InvalidRpcUrl',
  InvalidConfig = 'InvalidConfig',
}

export class SubnetWarpError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'SubnetWarpError';
  }
}

export function isSubnetWarpError(
  error: unknown,
  kind?: ErrorKind,
): error is SubnetWarpError {
  return (
    error instanceof SubnetWarpError && (kind === undefined || error.kind === kind)
  );
}

/**
 * Where a failed lookup was performed: the configuration file, a network
 * (by name) or a Subnet (by ID).
 */
export type LookupScope =
  | { type: 'configuration' }
  | { type: 'network'; name: string }
  | { type: 'subnet'; id: string };

function describeScope(scope: LookupScope): string {
  switch (scope.type) {
    case 'configuration':
      return 'configuration';
    case 'network':
      return `network '${scope.name}'`;
    case 'subnet':
      return `Subnet '${scope.id}'`;
  }
}

export class NotFoundError extends SubnetWarpError {
  constructor(
    public readonly scope: LookupScope,
    public readonly targetType: string,
    public readonly targetValue: string,
  ) {
    super(
      ErrorKind.ConfigNotFound,
      `${targetType} '${targetValue}' not found in ${describeScope(scope)}`,
    );
    this.name = 'NotFoundError';
  }
}

export class RemoteUnavailableError extends SubnetWarpError {
  constructor(
    public readonly url: string,
    message: string,
    cause?: unknown,
  ) {
    super(ErrorKind.RemoteUnavailable, `${url}: ${message}`, cause);
    this.name = 'RemoteUnavailableError';
  }
}

export class MalformedResponseError extends SubnetWarpError {
  constructor(
    public readonly method: string,
    message: string,
    cause?: unknown,
  ) {
    super(
      ErrorKind.MalformedResponse,
      `Malformed response to ${method}: ${message}`,
      cause,
    );
    this.name = 'MalformedResponseError';
  }
}

export class RpcApplicationError extends SubnetWarpError {
  constructor(
    public readonly method: string,
    public readonly code: number,
    public readonly rpcMessage: string,
    public readonly data?: unknown,
  ) {
    super(
      ErrorKind.RpcApplicationError,
      `${method} failed with code ${code}: ${rpcMessage}`,
    );
    this.name = 'RpcApplicationError';
  }
}

export class PayloadTooShortError extends SubnetWarpError {
  constructor(
    public readonly property: string,
    public readonly minLength: number,
    public readonly actualLength: number,
  ) {
    super(
      ErrorKind.PayloadTooShort,
      `${property} is too short: expected at least ${minLength} bytes, got ${actualLength}`,
    );
    this.name = 'PayloadTooShortError';
  }
}

export class PayloadIntegrityError extends SubnetWarpError {
  constructor(
    public readonly property: string,
    public readonly declaredLength: number,
    public readonly actualLength: number,
  ) {
    super(
      ErrorKind.PayloadIntegrity,
      `${property} length prefix ${declaredLength} does not match ${actualLength} bytes`,
    );
    this.name = 'PayloadIntegrityError';
  }
}

export class PeerNotFoundError extends SubnetWarpError {
  constructor(public readonly nodeId: string) {
    super(ErrorKind.PeerNotFound, `No peer found for validator ${nodeId}`);
    this.name = 'PeerNotFoundError';
  }
}

export class OperationNotAllowedError extends SubnetWarpError {
  constructor(
    public readonly operation: string,
    public readonly target: string,
  ) {
    super(
      ErrorKind.OperationNotAllowed,
      `Operation '${operation}' is not allowed on ${target}`,
    );
    this.name = 'OperationNotAllowedError';
  }
}

export class UnknownSourceChainError extends SubnetWarpError {
  constructor(
    public readonly subnetId: string,
    public readonly sourceChainId: string,
    cause?: unknown,
  ) {
    super(
      ErrorKind.UnknownSourceChain,
      `Source chain ${sourceChainId} is not a blockchain of Subnet ${subnetId}`,
      cause,
    );
    this.name = 'UnknownSourceChainError';
  }
}

export class InvalidRpcUrlError extends SubnetWarpError {
  constructor(
    public readonly rpcUrl: string,
    reason: string,
    cause?: unknown,
  ) {
    super(ErrorKind.InvalidRpcUrl, `Invalid RPC URL '${rpcUrl}': ${reason}`, cause);
    this.name = 'InvalidRpcUrlError';
  }
}

export class InvalidConfigError extends SubnetWarpError {
  constructor(
    public readonly source: string,
    message: string,
    cause?: unknown,
  ) {
    super(ErrorKind.InvalidConfig, `Invalid configuration ${source}: ${message}`, cause);
    this.name = 'InvalidConfigError';
  }
}
