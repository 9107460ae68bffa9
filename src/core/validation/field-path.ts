/**
 * Immutable path to a field, rendered as `spec.triggers[2].type` or
 * `metadata.annotations[openshift.io/host.generated]`.
 */
export class FieldPath {
  private constructor(
    private readonly parent: FieldPath | undefined,
    private readonly segment: string
  ) {}

  static of(name: string, ...more: string[]): FieldPath {
    return more.reduce((path, next) => path.child(next), new FieldPath(undefined, name));
  }

  child(name: string, ...more: string[]): FieldPath {
    const first = new FieldPath(this, `.${name}`);
    return more.reduce((path, next) => path.child(next), first);
  }

  index(i: number): FieldPath {
    return new FieldPath(this, `[${i}]`);
  }

  key(k: string): FieldPath {
    return new FieldPath(this, `[${k}]`);
  }

  toString(): string {
    const segments: string[] = [];
    for (let p: FieldPath | undefined = this; p; p = p.parent) {
      segments.unshift(p.segment);
    }
    return segments.join('');
  }
}
