import { ValidationException } from '../../exceptions';

export const GENDERS = ['masculine', 'feminine', 'neuter'] as const;
export const GRAMMATICAL_NUMBERS = ['singular', 'plural'] as const;
export const TENSES = [
  'present',
  'past',
  'imperfect',
  'future',
  'conditional',
  'present_perfect',
  'past_perfect',
  'future_perfect',
  'subjunctive',
  'imperative',
] as const;
export const PERSONS = [1, 2, 3] as const;

export type Gender = (typeof GENDERS)[number];
export type GrammaticalNumber = (typeof GRAMMATICAL_NUMBERS)[number];
export type Tense = (typeof TENSES)[number];
export type Person = (typeof PERSONS)[number];

/**
 * Raw morphological tags as they arrive from outside the domain.
 */
export interface MorphologyProps {
  gender?: string | null;
  number?: string | null;
  tense?: string | null;
  person?: number | string | null;
}

function parseTag<T extends string>(
  tag: string,
  allowed: readonly T[],
  value: string | null | undefined,
): T | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const normalized = value.toLowerCase().trim();
  const parsed = allowed.find((candidate) => candidate === normalized);
  if (!parsed) {
    throw new ValidationException('Morphology', `${tag} "${value}" is not valid`);
  }
  return parsed;
}

function parsePerson(value: number | string | null | undefined): Person | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const numeric = typeof value === 'number' ? value : Number(value.trim());
  const parsed = PERSONS.find((candidate) => candidate === numeric);
  if (!parsed) {
    throw new ValidationException('Morphology', `person "${value}" is not valid`);
  }
  return parsed;
}

/**
 * Value Object with the inflectional tags of a word form.
 * Every tag is optional: an uninflected word has an empty morphology.
 */
export class Morphology {
  private constructor(
    public readonly gender?: Gender,
    public readonly number?: GrammaticalNumber,
    public readonly tense?: Tense,
    public readonly person?: Person,
  ) {}

  static create(props: MorphologyProps = {}): Morphology {
    return new Morphology(
      parseTag('gender', GENDERS, props.gender),
      parseTag('number', GRAMMATICAL_NUMBERS, props.number),
      parseTag('tense', TENSES, props.tense),
      parsePerson(props.person),
    );
  }

  static empty(): Morphology {
    return new Morphology();
  }

  isEmpty(): boolean {
    return (
      this.gender === undefined &&
      this.number === undefined &&
      this.tense === undefined &&
      this.person === undefined
    );
  }

  // Canonical form used in lexeme identity, e.g. "gender=feminine;number=singular"
  get key(): string {
    const parts: string[] = [];
    if (this.gender) parts.push(`gender=${this.gender}`);
    if (this.number) parts.push(`number=${this.number}`);
    if (this.person) parts.push(`person=${this.person}`);
    if (this.tense) parts.push(`tense=${this.tense}`);
    return parts.join(';');
  }

  equals(other: Morphology): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return this.key || '-';
  }
}
