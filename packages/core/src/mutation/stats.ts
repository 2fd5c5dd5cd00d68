export type MutationChoice = 'keep' | 'mutate' | 'regenerate' | 'resize';

export interface MutationStatsSnapshot {
  calls: number;
  rounds: number;
  keep: number;
  mutate: number;
  regenerate: number;
  resize: number;
  leavesPerturbed: number;
  leavesObserved: number;
}

const EMPTY_SNAPSHOT: MutationStatsSnapshot = {
  calls: 0,
  rounds: 0,
  keep: 0,
  mutate: 0,
  regenerate: 0,
  resize: 0,
  leavesPerturbed: 0,
  leavesObserved: 0,
};

/**
 * Counters for the choices the mutator takes, accumulated across calls.
 */
export class MutationStats {
  private snapshot: MutationStatsSnapshot = { ...EMPTY_SNAPSHOT };

  recordCall(rounds: number): void {
    this.snapshot.calls++;
    this.snapshot.rounds += rounds;
  }

  recordChoice(choice: MutationChoice): void {
    this.snapshot[choice]++;
  }

  recordPerturbation(): void {
    this.snapshot.leavesPerturbed++;
  }

  recordObserved(count: number): void {
    this.snapshot.leavesObserved += count;
  }

  snapshotMetrics(): MutationStatsSnapshot {
    return { ...this.snapshot };
  }

  reset(): void {
    this.snapshot = { ...EMPTY_SNAPSHOT };
  }
}
