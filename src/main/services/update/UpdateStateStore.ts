import type { UpdatePhase, UpdateState } from '@shared/contracts';

export type UpdateStateListener = (next: UpdateState, previous: UpdateState) => void;

const ALLOWED_TRANSITIONS: Record<UpdatePhase, readonly UpdatePhase[]> = {
  idle: ['checking'],
  checking: ['idle', 'awaiting-confirmation'],
  'awaiting-confirmation': ['installing', 'cancelled'],
  installing: ['idle'],
  cancelled: ['idle']
};

/**
 * Dono unico do estado do fluxo de update. Vive so em memoria: a versao pendente
 * e descartada quando o processo reinicia.
 */
export class UpdateStateStore {
  private current: UpdateState = { phase: 'idle' };
  private readonly listeners = new Set<UpdateStateListener>();

  get(): UpdateState {
    return { ...this.current };
  }

  canTransition(to: UpdatePhase): boolean {
    return ALLOWED_TRANSITIONS[this.current.phase].includes(to);
  }

  transition(next: UpdateState): boolean {
    if (!this.canTransition(next.phase)) {
      return false;
    }

    const previous = this.current;
    this.current = { ...next };
    for (const listener of this.listeners) {
      listener(this.get(), previous);
    }
    return true;
  }

  subscribe(listener: UpdateStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

export function pendingVersionOf(state: UpdateState): string | null {
  return state.phase === 'awaiting-confirmation' || state.phase === 'installing' ? state.pendingVersion : null;
}
