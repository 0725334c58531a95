import type { StageEvent, StageName, StageStatus } from '../../shared/types';

export type StageEventSender = <T>(event: StageEvent<T>) => void;

export interface StageEmitter {
  readonly stage: StageName;
  start: (message: string) => void;
  success: <T>(message: string, data?: T) => void;
  failure: (error: unknown) => void;
}

export const makeStageEmitter = (runId: string, stage: StageName, send: StageEventSender): StageEmitter => {
  const emit = <T>(status: StageStatus, message: string, data?: T) =>
    send<T>({ runId, stage, status, message, data, ts: new Date().toISOString() });

  return {
    stage,
    start: (message) => emit('start', message),
    success: (message, data) => emit('success', message, data),
    failure: (error) => {
      const message = error instanceof Error ? error.message : String(error);
      const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      emit('failure', message, { error: message, code });
    },
  };
};
