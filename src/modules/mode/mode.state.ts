/**
 * Mode State
 * ==========
 * Shared handle between the scheduler loop (reader) and the tray/toggle
 * handler (writer). Every mutation is a single field assignment.
 */

export type Mode = 'auto' | 'manual';

export interface ModeSnapshot {
  mode: Mode;
  lastAppliedBrightness: number | null;   // Last level a tick wrote; unchanged ticks leave it
}

export type ModeListener = (snapshot: ModeSnapshot) => void;

export class ModeState {
  private mode: Mode;
  private lastApplied: number | null = null;
  private readonly listeners = new Set<ModeListener>();

  constructor(initial: Mode = 'auto') {
    this.mode = initial;
  }

  get(): Mode {
    return this.mode;
  }

  get lastAppliedBrightness(): number | null {
    return this.lastApplied;
  }

  isAuto(): boolean {
    return this.mode === 'auto';
  }

  toggle(): Mode {
    this.set(this.mode === 'auto' ? 'manual' : 'auto');
    return this.mode;
  }

  set(mode: Mode): void {
    if (this.mode === mode) {
      return;
    }
    this.mode = mode;
    this.notify();
  }

  recordApplied(value: number): void {
    this.lastApplied = value;
    this.notify();
  }

  snapshot(): ModeSnapshot {
    return { mode: this.mode, lastAppliedBrightness: this.lastApplied };
  }

  subscribe(listener: ModeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
