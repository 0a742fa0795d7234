/**
 * Hierarchical device attribute path, e.g. `SEQ1.TABLE.QUEUED_LINES`.
 *
 * Paths are plain values: building one never talks to the device and
 * resolving a path against a client happens on every access.
 */
export class FieldPath {
  readonly segments: readonly string[];

  private constructor(segments: readonly string[]) {
    this.segments = segments;
  }

  static of(path: string): FieldPath {
    return new FieldPath(splitPath(path));
  }

  child(name: string): FieldPath {
    return new FieldPath([...this.segments, ...splitPath(name)]);
  }

  get block(): string {
    return this.segments[0] ?? '';
  }

  toString(): string {
    return this.segments.join('.');
  }
}

function splitPath(path: string): string[] {
  return path
    .split('.')
    .map((segment) => segment.trim().toUpperCase())
    .filter((segment) => segment.length > 0);
}

export function resolvePath(path: string | FieldPath): FieldPath {
  return typeof path === 'string' ? FieldPath.of(path) : path;
}
