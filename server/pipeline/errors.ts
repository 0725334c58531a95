export type ClassificationErrorCode = 'TooShort' | 'TooLong' | 'ScorerUnavailable' | 'NoResults';

export class ClassificationError extends Error {
  constructor(readonly code: ClassificationErrorCode, message: string) {
    super(message);
    this.name = 'ClassificationError';
  }
}

export const isClassificationError = (error: unknown): error is ClassificationError =>
  error instanceof ClassificationError;
