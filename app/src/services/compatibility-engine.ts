/**
 * Compatibility Engine: decides whether a candidate schema may follow the
 * existing versions of a subject under a compatibility mode.
 *
 * The pairwise rule is Avro schema resolution ("can a reader using schema R
 * decode data written with schema W?") with one addition: a writer field the
 * reader does not declare must carry a default. Field presence therefore
 * behaves the same in both directions (adding or dropping a field needs a
 * default) while type promotion stays directional (int → long reads, the
 * reverse does not).
 *
 * Mode → checks, with `old` = reference version, `new` = candidate:
 * - NONE: nothing
 * - BACKWARD: canRead(new, old)
 * - FORWARD: canRead(old, new)
 * - FULL: both
 * - *_TRANSITIVE: against every reference instead of the latest only
 */
import type { CompatibilityViolation } from '../errors.js';
import type { AvroNamed, AvroPrimitiveName, AvroSchema, AvroType } from '../types/avro.js';
import type { CompatibilityMode } from '../types/registry.js';
import { derefType } from './avro-canonicalizer.js';

export type ResolutionDirection = CompatibilityViolation['direction'];

/** A prior version to check against. */
export interface ReferenceSchema {
  readonly version?: number;
  readonly schema: AvroSchema;
}

export interface CompatibilityResult {
  readonly compatible: boolean;
  readonly mode: CompatibilityMode;
  /** Versions the candidate was actually checked against. */
  readonly checkedVersions: readonly (number | undefined)[];
  readonly violations: readonly CompatibilityViolation[];
}

/** Writer type → reader types it promotes to. */
const PROMOTIONS: Readonly<Partial<Record<AvroPrimitiveName, readonly AvroPrimitiveName[]>>> = {
  int: ['long', 'float', 'double'],
  long: ['float', 'double'],
  float: ['double'],
  string: ['bytes'],
  bytes: ['string'],
};

const MODE_DIRECTIONS: Readonly<Record<CompatibilityMode, readonly ResolutionDirection[]>> = {
  NONE: [],
  BACKWARD: ['backward'],
  BACKWARD_TRANSITIVE: ['backward'],
  FORWARD: ['forward'],
  FORWARD_TRANSITIVE: ['forward'],
  FULL: ['backward', 'forward'],
  FULL_TRANSITIVE: ['backward', 'forward'],
};

export function isTransitive(mode: CompatibilityMode): boolean {
  return mode.endsWith('_TRANSITIVE');
}

/**
 * Select the references a mode checks against from a history ordered oldest
 * to newest: all of them for transitive modes, the newest otherwise.
 */
export function referencesFor<T>(mode: CompatibilityMode, history: readonly T[]): readonly T[] {
  if (mode === 'NONE' || history.length === 0) return [];
  if (isTransitive(mode)) return history;
  return history.slice(-1);
}

// ─── Pairwise Resolution ──────────────────────────────────────

type Resolved = Exclude<AvroType, { type: 'ref' }>;

function unqualified(name: string): string {
  return name.slice(name.lastIndexOf('.') + 1);
}

function namesMatch(reader: AvroNamed, writer: AvroNamed): boolean {
  if (reader.name === writer.name) return true;
  if (unqualified(reader.name) === unqualified(writer.name)) return true;
  return reader.aliases.some((alias) => alias === writer.name || unqualified(alias) === unqualified(writer.name));
}

function describe(type: Resolved): string {
  switch (type.type) {
    case 'record':
    case 'enum':
    case 'fixed':
      return `${type.type} '${type.name}'`;
    case 'array':
      return 'array';
    case 'map':
      return 'map';
    case 'union':
      return 'union';
    default:
      return type.type;
  }
}

/**
 * Walks a reader/writer pair. Recursive named types terminate through the
 * in-progress pair set: a pair already being resolved is assumed readable.
 */
class SchemaResolver {
  private readonly inProgress = new Set<string>();

  constructor(
    private readonly reader: AvroSchema,
    private readonly writer: AvroSchema,
    private readonly direction: ResolutionDirection,
    private readonly version: number | undefined,
  ) {}

  run(): CompatibilityViolation[] {
    return this.resolve(this.reader.root, this.writer.root, '$');
  }

  private violation(
    rule: CompatibilityViolation['rule'],
    path: string,
    message: string,
  ): CompatibilityViolation {
    return {
      rule,
      path,
      direction: this.direction,
      ...(this.version !== undefined ? { version: this.version } : {}),
      message,
    };
  }

  private resolve(readerType: AvroType, writerType: AvroType, path: string): CompatibilityViolation[] {
    const r = derefType(readerType, this.reader.named);
    const w = derefType(writerType, this.writer.named);

    if (w.type === 'union') {
      return w.branches.flatMap((branch) => this.resolve(r, branch, path));
    }

    if (r.type === 'union') {
      const match = r.branches.some((branch) => this.resolve(branch, w, path).length === 0);
      return match
        ? []
        : [this.violation('MISSING_UNION_BRANCH', path, `writer ${describe(w)} matches no branch of the reader union`)];
    }

    switch (r.type) {
      case 'record':
        return w.type === 'record' ? this.resolveRecord(r, w, path) : this.mismatch(r, w, path);
      case 'enum': {
        if (w.type !== 'enum') return this.mismatch(r, w, path);
        if (!namesMatch(r, w)) return [this.nameMismatch(r, w, path)];
        const missing = w.symbols.filter((symbol) => !r.symbols.includes(symbol));
        if (missing.length > 0 && r.default === undefined) {
          return [
            this.violation(
              'MISSING_ENUM_SYMBOLS',
              path,
              `reader enum '${r.name}' lacks symbols [${missing.join(', ')}] and declares no default`,
            ),
          ];
        }
        return [];
      }
      case 'fixed':
        if (w.type !== 'fixed') return this.mismatch(r, w, path);
        if (!namesMatch(r, w)) return [this.nameMismatch(r, w, path)];
        if (r.size !== w.size) {
          return [
            this.violation('FIXED_SIZE_MISMATCH', path, `fixed '${r.name}' size ${w.size} cannot be read as size ${r.size}`),
          ];
        }
        return [];
      case 'array':
        return w.type === 'array' ? this.resolve(r.items, w.items, `${path}[]`) : this.mismatch(r, w, path);
      case 'map':
        return w.type === 'map' ? this.resolve(r.values, w.values, `${path}{}`) : this.mismatch(r, w, path);
      default: {
        if (w.type === r.type) return [];
        if (isPrimitive(w) && (PROMOTIONS[w.type] ?? []).includes(r.type)) return [];
        return this.mismatch(r, w, path);
      }
    }
  }

  private resolveRecord(
    r: Extract<Resolved, { type: 'record' }>,
    w: Extract<Resolved, { type: 'record' }>,
    path: string,
  ): CompatibilityViolation[] {
    if (!namesMatch(r, w)) return [this.nameMismatch(r, w, path)];

    const pairKey = `${r.name}|${w.name}`;
    if (this.inProgress.has(pairKey)) return [];
    this.inProgress.add(pairKey);

    const violations: CompatibilityViolation[] = [];
    const matchedWriterFields = new Set<string>();

    for (const readerField of r.fields) {
      const fieldPath = `${path}.${readerField.name}`;
      const writerField =
        w.fields.find((f) => f.name === readerField.name) ??
        w.fields.find((f) => readerField.aliases.includes(f.name));

      if (writerField) {
        matchedWriterFields.add(writerField.name);
        violations.push(...this.resolve(readerField.type, writerField.type, fieldPath));
      } else if (readerField.default === undefined) {
        const verb = this.direction === 'backward' ? 'added' : 'removed';
        violations.push(
          this.violation(
            'READER_FIELD_MISSING_DEFAULT_VALUE',
            fieldPath,
            `field '${readerField.name}' ${verb} without a default value`,
          ),
        );
      }
    }

    for (const writerField of w.fields) {
      if (matchedWriterFields.has(writerField.name) || writerField.default !== undefined) continue;
      const verb = this.direction === 'backward' ? 'removed' : 'added';
      violations.push(
        this.violation(
          'WRITER_FIELD_DROPPED_WITHOUT_DEFAULT',
          `${path}.${writerField.name}`,
          `field '${writerField.name}' ${verb} without a default value`,
        ),
      );
    }

    this.inProgress.delete(pairKey);
    return violations;
  }

  private mismatch(r: Resolved, w: Resolved, path: string): CompatibilityViolation[] {
    return [this.violation('TYPE_MISMATCH', path, `reader ${describe(r)} cannot read writer ${describe(w)}`)];
  }

  private nameMismatch(r: AvroNamed, w: AvroNamed, path: string): CompatibilityViolation {
    return this.violation('NAME_MISMATCH', path, `reader ${r.type} '${r.name}' does not match writer '${w.name}'`);
  }
}

function isPrimitive(type: Resolved): type is Extract<Resolved, { type: AvroPrimitiveName }> {
  return (
    type.type !== 'record' &&
    type.type !== 'enum' &&
    type.type !== 'fixed' &&
    type.type !== 'array' &&
    type.type !== 'map' &&
    type.type !== 'union'
  );
}

/**
 * List the reasons data written with `writer` cannot be decoded by `reader`.
 * Empty when the pair resolves.
 */
export function canRead(
  reader: AvroSchema,
  writer: AvroSchema,
  direction: ResolutionDirection = 'backward',
  version?: number,
): CompatibilityViolation[] {
  return new SchemaResolver(reader, writer, direction, version).run();
}

// ─── Mode Evaluation ──────────────────────────────────────────

/**
 * Check a candidate against references ordered oldest to newest.
 * Non-transitive modes consider only the newest reference; an empty
 * reference list is always compatible.
 */
export function checkCompatibility(
  candidate: AvroSchema,
  references: readonly ReferenceSchema[],
  mode: CompatibilityMode,
): CompatibilityResult {
  const selected = referencesFor(mode, references);
  const violations: CompatibilityViolation[] = [];

  for (const ref of selected) {
    for (const direction of MODE_DIRECTIONS[mode]) {
      const pair =
        direction === 'backward'
          ? canRead(candidate, ref.schema, direction, ref.version)
          : canRead(ref.schema, candidate, direction, ref.version);
      violations.push(...pair);
    }
  }

  return {
    compatible: violations.length === 0,
    mode,
    checkedVersions: selected.map((ref) => ref.version),
    violations,
  };
}

export function isCompatible(
  candidate: AvroSchema,
  references: readonly ReferenceSchema[],
  mode: CompatibilityMode,
): boolean {
  return checkCompatibility(candidate, references, mode).compatible;
}
