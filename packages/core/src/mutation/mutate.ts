/**
 * Mutation algorithm
 *
 * Rewrites an existing value into a new value of the same shape. Each
 * round walks the tree and takes one weighted choice per node:
 *
 *  - keep        leave the subtree as it is
 *  - mutate      recurse into composites, perturb leaves
 *  - regenerate  replace the subtree via generateAbiValue
 *  - resize      new length for slices, bytes and strings
 *
 * Finalized leaves are handed to `generator.observe`, which is how the
 * mutating generator grows its corpus.
 */

import { forEachLeaf } from '../corpus/value-set.js';
import { generateAbiValue } from '../generator/generate.js';
import type { ValueGenerator } from '../generator/value-generator.js';
import {
  assertNever,
  typeKey,
  type TypeDescriptor,
} from '../types/descriptor.js';
import { ShapeMismatchError, excerpt } from '../types/errors.js';
import { isErr, ok, type Result } from '../types/result.js';
import type { AbiValue, TupleFieldValue } from '../types/value.js';
import { cloneValue } from '../value/equal.js';
import { checkShape, childPath } from '../value/shape.js';
import {
  perturbBytes,
  perturbInteger,
  perturbString,
  resizeSequence,
} from './leaf-mutations.js';
import type { MutationChoice, MutationStats } from './stats.js';

export interface MutateOptions {
  /** Collector for the choices taken; shared across calls */
  stats?: MutationStats;
}

function isResizable(type: TypeDescriptor): boolean {
  return type.kind === 'slice' || type.kind === 'bytes' || type.kind === 'string';
}

/**
 * Mutate `value` of `type`. The input is never modified.
 *
 * Fails only when `value` does not match `type`, which is expected for
 * corpus entries read back from an untrusted source.
 */
export function mutateAbiValue(
  generator: ValueGenerator,
  type: TypeDescriptor,
  value: AbiValue,
  options: MutateOptions = {}
): Result<AbiValue, ShapeMismatchError> {
  const shape = checkShape(type, value);
  if (isErr(shape)) {
    return shape;
  }

  const { stats } = options;
  const [minRounds, maxRounds] = generator.mutation.rounds;
  const rounds = generator.rng.intBetween(minRounds, maxRounds);
  stats?.recordCall(rounds);

  let current = cloneValue(value);
  if (rounds === 0) {
    return ok(current);
  }

  const mutator = new TreeMutator(generator, stats);
  for (let round = 0; round < rounds; round++) {
    current = mutator.visit(type, current, '$');
  }

  let observed = 0;
  forEachLeaf(type, current, (leafType, leaf) => {
    generator.observe(leafType, leaf);
    observed++;
  });
  stats?.recordObserved(observed);

  return ok(current);
}

class TreeMutator {
  constructor(
    private readonly generator: ValueGenerator,
    private readonly stats: MutationStats | undefined
  ) {}

  visit(type: TypeDescriptor, value: AbiValue, path: string): AbiValue {
    const choice = this.choose(type);
    this.stats?.recordChoice(choice);
    switch (choice) {
      case 'keep':
        return value;
      case 'regenerate':
        return generateAbiValue(this.generator, type);
      case 'resize':
        return this.resize(type, value, path);
      case 'mutate':
        return this.mutate(type, value, path);
    }
  }

  private choose(type: TypeDescriptor): MutationChoice {
    const { weights } = this.generator.mutation;
    const entries: Array<readonly [MutationChoice, number]> = [
      ['keep', weights.keep],
      ['mutate', weights.mutate],
      ['regenerate', weights.regenerate],
    ];
    if (isResizable(type)) {
      entries.push(['resize', weights.resize]);
    }
    return this.generator.rng.weighted(entries) ?? 'keep';
  }

  private mutate(type: TypeDescriptor, value: AbiValue, path: string): AbiValue {
    const { generator } = this;
    switch (type.kind) {
      case 'bool':
        if (value.kind !== 'bool') break;
        this.stats?.recordPerturbation();
        return { kind: 'bool', value: !value.value };
      case 'address':
        if (value.kind !== 'address') break;
        this.stats?.recordPerturbation();
        return { kind: 'address', value: perturbBytes(generator, value.value) };
      case 'fixedBytes':
        if (value.kind !== 'fixedBytes') break;
        this.stats?.recordPerturbation();
        return { kind: 'fixedBytes', value: perturbBytes(generator, value.value) };
      case 'bytes':
        if (value.kind !== 'bytes') break;
        this.stats?.recordPerturbation();
        return {
          kind: 'bytes',
          value: perturbBytes(generator, value.value, generator.config.bytesLength),
        };
      case 'string':
        if (value.kind !== 'string') break;
        this.stats?.recordPerturbation();
        return {
          kind: 'string',
          value: perturbString(generator, value.value, generator.config.stringLength),
        };
      case 'int':
        if (value.kind !== 'int') break;
        this.stats?.recordPerturbation();
        return {
          kind: 'int',
          value: perturbInteger(generator.rng, value.value, true, type.bits),
        };
      case 'uint':
        if (value.kind !== 'uint') break;
        this.stats?.recordPerturbation();
        return {
          kind: 'uint',
          value: perturbInteger(generator.rng, value.value, false, type.bits),
        };
      case 'array': {
        if (value.kind !== 'array') break;
        const { elem } = type;
        return {
          kind: 'array',
          elements: value.elements.map((element, index) =>
            this.visit(elem, element, childPath(path, index))
          ),
        };
      }
      case 'slice': {
        if (value.kind !== 'slice') break;
        const { elem } = type;
        return {
          kind: 'slice',
          elements: value.elements.map((element, index) =>
            this.visit(elem, element, childPath(path, index))
          ),
        };
      }
      case 'tuple': {
        if (value.kind !== 'tuple') break;
        const fields: TupleFieldValue[] = [];
        for (const [index, field] of type.fields.entries()) {
          const actual = value.fields[index];
          if (actual === undefined) {
            throw unreachableMismatch(type, value, childPath(path, index, field.name));
          }
          fields.push({
            name: actual.name,
            value: this.visit(
              field.type,
              actual.value,
              childPath(path, index, field.name || actual.name)
            ),
          });
        }
        return { kind: 'tuple', fields };
      }
      default:
        return assertNever(type, 'type kind');
    }
    throw unreachableMismatch(type, value, path);
  }

  private resize(type: TypeDescriptor, value: AbiValue, path: string): AbiValue {
    const { generator } = this;
    const { rng, config } = generator;
    const target = (bounds: readonly [number, number]): number =>
      rng.intBetween(bounds[0], bounds[1]);

    if (type.kind === 'slice' && value.kind === 'slice') {
      const { elem } = type;
      return {
        kind: 'slice',
        elements: resizeSequence(rng, value.elements, target(config.arrayLength), () =>
          generateAbiValue(generator, elem)
        ),
      };
    }
    if (type.kind === 'bytes' && value.kind === 'bytes') {
      const resized = resizeSequence(
        rng,
        Array.from(value.value),
        target(config.bytesLength),
        () => rng.intBetween(0, 255)
      );
      return { kind: 'bytes', value: Uint8Array.from(resized) };
    }
    if (type.kind === 'string' && value.kind === 'string') {
      const resized = resizeSequence(
        rng,
        Array.from(value.value),
        target(config.stringLength),
        () => generator.stringOfLength(1)
      );
      return { kind: 'string', value: resized.join('') };
    }
    throw unreachableMismatch(type, value, path);
  }
}

// checkShape already ran; reaching this means the tree changed underneath us
function unreachableMismatch(
  type: TypeDescriptor,
  value: AbiValue,
  path: string
): ShapeMismatchError {
  return new ShapeMismatchError({
    message: `Shape mismatch at ${path}: expected ${typeKey(type)}, got ${value.kind}`,
    context: { path, typeKey: typeKey(type), valueExcerpt: excerpt(value) },
  });
}
