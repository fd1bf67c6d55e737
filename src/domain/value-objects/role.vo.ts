import { ValidationException } from '../exceptions';

export type RoleValue = 'system' | 'user' | 'assistant';

/**
 * Value Object tagging who authored a chat message.
 */
export class Role {
  private static readonly VALID_ROLES: readonly RoleValue[] = ['system', 'user', 'assistant'];

  private constructor(public readonly value: RoleValue) {}

  static system(): Role {
    return new Role('system');
  }

  static user(): Role {
    return new Role('user');
  }

  static assistant(): Role {
    return new Role('assistant');
  }

  static fromString(role: string): Role {
    const normalized = role.toLowerCase().trim();
    const value = Role.VALID_ROLES.find((candidate) => candidate === normalized);
    if (!value) {
      throw new ValidationException(
        'Role',
        `"${role}" is not valid. Valid roles: ${Role.VALID_ROLES.join(', ')}`,
      );
    }
    return new Role(value);
  }

  isSystem(): boolean {
    return this.value === 'system';
  }

  isUser(): boolean {
    return this.value === 'user';
  }

  isAssistant(): boolean {
    return this.value === 'assistant';
  }

  equals(other: Role): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
