/**
 * Field paths.
 *
 * One position has two renderings: the store path (store names only, used
 * for exemptions and flattened output) and the error path, which also
 * carries collection indexes and map keys.
 */
export class FieldPath {
  static readonly root = new FieldPath([], []);

  private constructor(
    private readonly storeSegments: readonly string[],
    private readonly errorSegments: readonly string[]
  ) {}

  /** Path of a named field below this one */
  child(name: string): FieldPath {
    return new FieldPath([...this.storeSegments, name], [...this.errorSegments, name]);
  }

  /** Path of a collection element; only the error path changes */
  element(position: string | number): FieldPath {
    return new FieldPath(this.storeSegments, [...this.errorSegments, String(position)]);
  }

  get store(): string {
    return this.storeSegments.join('.');
  }

  get display(): string {
    return this.errorSegments.join('.');
  }

  toString(): string {
    return this.display;
  }
}
