/**
 * The one place a resource's in-memory value changes. Loaders `invalidate()`
 * before they start and on failure, and `commit()` only on success, so the
 * value is never stale and never half-applied.
 */
export class ResourceCell<T> {
  private value: T | undefined = undefined;

  public current(): T | undefined {
    return this.value;
  }

  public commit(value: T): void {
    this.value = value;
  }

  public invalidate(): void {
    this.value = undefined;
  }
}
