import { ValidationException } from '../exceptions';

export type GenerationStyle = 'practice' | 'explanatory' | 'corrective' | 'conversational';

export type CreativityLevel = 'strict' | 'controlled' | 'moderate' | 'expressive';

export interface TutorProfileProps {
  creativity?: number;
  style?: string;
}

/**
 * Value Object holding how the AI tutor should answer in one conversation.
 *
 * `creativity` is a sampling knob in [0, 1]; `style` is the pedagogical
 * approach. A conversation never mutates its profile: changing it means
 * replacing the whole value.
 */
export class TutorProfile {
  static readonly DEFAULT_CREATIVITY = 0.5;
  static readonly DEFAULT_STYLE: GenerationStyle = 'conversational';

  private static readonly STYLES: readonly GenerationStyle[] = [
    'practice',
    'explanatory',
    'corrective',
    'conversational',
  ];

  private static readonly STYLE_INSTRUCTIONS: Readonly<Record<GenerationStyle, string>> = {
    practice: 'focus on exercises and drills to reinforce learning',
    explanatory: 'provide detailed explanations and deep understanding',
    corrective: 'emphasize error correction and guidance toward correct responses',
    conversational: 'use natural dialogue and conversational language',
  };

  private static readonly TONES: Readonly<Record<CreativityLevel, string>> = {
    strict: 'strictly deterministic and consistent',
    controlled: 'controlled with moderate variation',
    moderate: 'naturally varied and expressive',
    expressive: 'highly variable and creative',
  };

  private constructor(
    public readonly creativity: number,
    public readonly style: GenerationStyle,
  ) {
    this.validate();
  }

  static create(props: TutorProfileProps = {}): TutorProfile {
    const creativity = props.creativity ?? TutorProfile.DEFAULT_CREATIVITY;
    return new TutorProfile(creativity, TutorProfile.parseStyle(props.style));
  }

  static default(): TutorProfile {
    return new TutorProfile(TutorProfile.DEFAULT_CREATIVITY, TutorProfile.DEFAULT_STYLE);
  }

  private static parseStyle(style?: string): GenerationStyle {
    if (style === undefined) {
      return TutorProfile.DEFAULT_STYLE;
    }
    const normalized = style.toLowerCase().trim();
    const parsed = TutorProfile.STYLES.find((candidate) => candidate === normalized);
    if (!parsed) {
      throw new ValidationException(
        'TutorProfile',
        `style "${style}" is not valid. Valid styles: ${TutorProfile.STYLES.join(', ')}`,
      );
    }
    return parsed;
  }

  private validate(): void {
    if (!Number.isFinite(this.creativity) || this.creativity < 0 || this.creativity > 1) {
      throw new ValidationException(
        'TutorProfile',
        `creativity must be between 0 and 1, got ${this.creativity}`,
      );
    }
  }

  get creativityLevel(): CreativityLevel {
    if (this.creativity < 0.25) return 'strict';
    if (this.creativity < 0.5) return 'controlled';
    if (this.creativity < 0.75) return 'moderate';
    return 'expressive';
  }

  withCreativity(creativity: number): TutorProfile {
    return new TutorProfile(creativity, this.style);
  }

  withStyle(style: string): TutorProfile {
    return new TutorProfile(this.creativity, TutorProfile.parseStyle(style));
  }

  // Rendered into the tutor's system prompt
  toInstructions(): string {
    return (
      'This is how you should answer:\n' +
      `- Style: ${TutorProfile.STYLE_INSTRUCTIONS[this.style]}\n` +
      `- Tone: ${TutorProfile.TONES[this.creativityLevel]}`
    );
  }

  equals(other: TutorProfile): boolean {
    return this.creativity === other.creativity && this.style === other.style;
  }

  toString(): string {
    return `${this.style} (creativity ${this.creativity})`;
  }
}
