import { MetricsSnapshot } from '../domain/snapshot';

/**
 * Retains published snapshots by data version. Production wires this to whatever store keeps the
 * raw JSON history; the in-memory version backs the CLI and the tests.
 */
export interface SnapshotStore {
  save(version: string, snapshot: MetricsSnapshot): void;
  get(version: string): MetricsSnapshot | undefined;
  versions(): string[];
}

export class InMemorySnapshotStore implements SnapshotStore {
  private snapshots = new Map<string, MetricsSnapshot>();

  save(version: string, snapshot: MetricsSnapshot) {
    this.snapshots.set(version, snapshot);
  }

  get(version: string): MetricsSnapshot | undefined {
    return this.snapshots.get(version);
  }

  versions(): string[] {
    return [...this.snapshots.keys()].sort();
  }
}
