import { InvalidStateTransitionException } from '../exceptions';
import { CEFRLevel, Language, LanguagePair, UserId } from '../value-objects';

export interface LanguageProficiency {
  readonly language: Language;
  readonly level: CEFRLevel;
}

/**
 * Entity representing a learner.
 *
 * Keeps one CEFR level per language the learner has studied, so switching the
 * learning goal back and forth does not lose earlier assessments. The level of
 * the current target language only changes through `reassessProficiency`.
 */
export class User {
  private constructor(
    public readonly id: UserId,
    private _languages: LanguagePair,
    private _levels: Map<string, LanguageProficiency>,
    public readonly createdAt: Date,
    private _updatedAt: Date,
  ) {}

  static register(props: {
    nativeLanguage: Language;
    targetLanguage: Language;
    now: Date;
    level?: CEFRLevel;
    id?: UserId;
  }): User {
    const languages = LanguagePair.of(props.nativeLanguage, props.targetLanguage);
    const levels = new Map<string, LanguageProficiency>();
    levels.set(languages.target.code, {
      language: languages.target,
      level: props.level ?? CEFRLevel.lowest(),
    });
    return new User(props.id ?? UserId.generate(), languages, levels, props.now, props.now);
  }

  static reconstitute(props: {
    id: UserId;
    languages: LanguagePair;
    proficiencies: LanguageProficiency[];
    createdAt: Date;
    updatedAt: Date;
  }): User {
    const levels = new Map<string, LanguageProficiency>();
    for (const proficiency of props.proficiencies) {
      levels.set(proficiency.language.code, proficiency);
    }
    if (!levels.has(props.languages.target.code)) {
      levels.set(props.languages.target.code, {
        language: props.languages.target,
        level: CEFRLevel.lowest(),
      });
    }
    return new User(props.id, props.languages, levels, props.createdAt, props.updatedAt);
  }

  get languages(): LanguagePair {
    return this._languages;
  }

  get nativeLanguage(): Language {
    return this._languages.native;
  }

  get targetLanguage(): Language {
    return this._languages.target;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  // Level in the current target language
  get currentLevel(): CEFRLevel {
    return this.levelFor(this._languages.target) ?? CEFRLevel.lowest();
  }

  get proficiencies(): readonly LanguageProficiency[] {
    return [...this._levels.values()];
  }

  levelFor(language: Language): CEFRLevel | null {
    return this._levels.get(language.code)?.level ?? null;
  }

  /**
   * Records the outcome of a proficiency assessment for the current target language.
   * A reassessment confirms the level or moves it one step up or down.
   */
  reassessProficiency(level: CEFRLevel, at: Date): void {
    const current = this.currentLevel;
    if (!level.equals(current) && !level.isAdjacentTo(current)) {
      throw new InvalidStateTransitionException('proficiency', current.value, level.value);
    }
    this._levels.set(this._languages.target.code, { language: this._languages.target, level });
    this.touch(at);
  }

  /**
   * Changes native and/or target language in one step, so the two can also be swapped.
   * A level already known for the new target language is kept; otherwise the
   * learner starts at `initialLevel` (A1 by default).
   */
  changeLanguages(
    change: { native?: Language; target?: Language },
    at: Date,
    initialLevel?: CEFRLevel,
  ): void {
    const target = change.target ?? this._languages.target;
    this._languages = LanguagePair.of(change.native ?? this._languages.native, target);
    if (!this._levels.has(target.code)) {
      this._levels.set(target.code, { language: target, level: initialLevel ?? CEFRLevel.lowest() });
    }
    this.touch(at);
  }

  // Changes the learning goal
  switchTargetLanguage(language: Language, at: Date, initialLevel?: CEFRLevel): void {
    this.changeLanguages({ target: language }, at, initialLevel);
  }

  // Fixes a native language recorded wrongly at registration
  correctNativeLanguage(language: Language, at: Date): void {
    this.changeLanguages({ native: language }, at);
  }

  equals(other: User): boolean {
    return this.id.equals(other.id);
  }

  private touch(at: Date): void {
    if (at.getTime() > this._updatedAt.getTime()) {
      this._updatedAt = at;
    }
  }
}
