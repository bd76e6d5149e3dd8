export class RepositoryValidationError extends Error {
  readonly code = 'validation_failed' as const;

  constructor(message: string) {
    super(message);
    this.name = 'RepositoryValidationError';
  }
}

export function requireCollectionName(name: string | undefined): string {
  const trimmed = typeof name === 'string' ? name.trim() : '';
  if (trimmed.length === 0) {
    throw new RepositoryValidationError('Collection name must be a non-empty string');
  }

  return trimmed;
}
