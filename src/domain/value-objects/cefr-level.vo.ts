import { ValidationException } from '../exceptions';

export type CEFRToken = 'A1' | 'A2' | 'B1' | 'B2' | 'C1' | 'C2';

/**
 * Value Object representing a CEFR proficiency level (A1 lowest, C2 highest).
 * Levels are totally ordered; `atLeast` is what content gating relies on.
 */
export class CEFRLevel {
  private static readonly ORDER: readonly CEFRToken[] = ['A1', 'A2', 'B1', 'B2', 'C1', 'C2'];

  private static readonly DESCRIPTIONS: Readonly<Record<CEFRToken, string>> = {
    A1: 'Beginner',
    A2: 'Elementary',
    B1: 'Intermediate',
    B2: 'Upper intermediate',
    C1: 'Advanced',
    C2: 'Proficient',
  };

  private constructor(public readonly value: CEFRToken) {}

  static fromString(level: string): CEFRLevel {
    const normalized = level.toUpperCase().trim();
    const token = CEFRLevel.ORDER.find((candidate) => candidate === normalized);
    if (!token) {
      throw new ValidationException(
        'CEFRLevel',
        `"${level}" is not valid. Valid levels: ${CEFRLevel.ORDER.join(', ')}`,
      );
    }
    return new CEFRLevel(token);
  }

  static lowest(): CEFRLevel {
    return new CEFRLevel('A1');
  }

  static all(): CEFRLevel[] {
    return CEFRLevel.ORDER.map((token) => new CEFRLevel(token));
  }

  // 1 (A1) .. 6 (C2)
  get rank(): number {
    return CEFRLevel.ORDER.indexOf(this.value) + 1;
  }

  get description(): string {
    return CEFRLevel.DESCRIPTIONS[this.value];
  }

  isBeginner(): boolean {
    return this.rank <= 2;
  }

  isIntermediate(): boolean {
    return this.rank === 3 || this.rank === 4;
  }

  isAdvanced(): boolean {
    return this.rank >= 5;
  }

  atLeast(other: CEFRLevel): boolean {
    return this.rank >= other.rank;
  }

  compareTo(other: CEFRLevel): number {
    return this.rank - other.rank;
  }

  isAdjacentTo(other: CEFRLevel): boolean {
    return Math.abs(this.rank - other.rank) === 1;
  }

  equals(other: CEFRLevel): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
