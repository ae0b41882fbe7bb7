export type DemoErrorKind = 'rpc' | 'wallet' | 'tx' | 'io' | 'config';

export class DemoError extends Error {
  readonly kind: DemoErrorKind;
  /** JSON-RPC error code reported by the node, when there is one. */
  readonly code?: number;

  constructor(params: {
    message: string;
    kind: DemoErrorKind;
    code?: number;
    cause?: unknown;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'DemoError';
    this.kind = params.kind;
    this.code = params.code;
  }
}

export function isDemoError(error: unknown): error is DemoError {
  return error instanceof DemoError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

// bitcoin-core's RpcError carries the node's numeric code; socket errors carry a string one
export function rpcErrorCode(error: unknown): number | undefined {
  if (isDemoError(error)) return error.code;
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'number') return code;
  }
  return undefined;
}

export function formatDemoError(error: unknown): string {
  if (!isDemoError(error)) return errorMessage(error);
  const code = error.code === undefined ? '' : ` ${error.code}`;
  return `[${error.kind.toUpperCase()}${code}] ${error.message}`;
}
