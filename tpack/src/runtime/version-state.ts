/** A value computed on first read and kept until `reset()`. */
export class VersionState<T> {
  private memo: { value: T } | null = null;

  constructor(private readonly compute: () => T) {}

  get(): T {
    if (!this.memo) this.memo = { value: this.compute() };
    return this.memo.value;
  }

  reset(): void {
    this.memo = null;
  }
}
