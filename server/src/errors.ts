export type ProblemKind = 'analysis-warning' | 'move-error' | 'cleanup-error';

export interface Problem {
  kind: ProblemKind;
  /** The file or directory the problem is about */
  path: string;
  cause: string;
  /** Destination, for move errors */
  target?: string;
}

/** A source root or the destination root is missing or unusable. */
export class ConfigError extends Error {
  constructor(message: string, readonly path?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function analysisWarning(path: string, err: unknown): Problem {
  return { kind: 'analysis-warning', path, cause: describeError(err) };
}

export function moveError(path: string, target: string, err: unknown): Problem {
  return { kind: 'move-error', path, target, cause: describeError(err) };
}

export function cleanupError(path: string, err: unknown): Problem {
  return { kind: 'cleanup-error', path, cause: describeError(err) };
}

export function formatProblem(p: Problem): string {
  if (p.target) return `${p.path} -> ${p.target}: ${p.cause}`;
  return `${p.path}: ${p.cause}`;
}
