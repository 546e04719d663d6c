import { InvalidValueException } from '../exceptions';

/**
 * Value Object for the upstream agent's session identifier.
 *
 * The agent never sends the id on its own: it is embedded in every context
 * name, e.g. `projects/p/agent/sessions/<id>/contexts/ongoing-order`.
 */
export class SessionId {
  private static readonly CONTEXT_NAME_PATTERN = /\/sessions\/(.*?)\/contexts\//;

  private constructor(public readonly value: string) {
    this.validate();
  }

  static fromString(id: string): SessionId {
    return new SessionId(id);
  }

  /**
   * Extracts the session id from a context name.
   * Returns null when the name carries no `/sessions/<id>/contexts/` segment.
   */
  static fromContextName(contextName: string): SessionId | null {
    const match = SessionId.CONTEXT_NAME_PATTERN.exec(contextName);
    const id = match?.[1];
    if (!id || id.trim().length === 0) {
      return null;
    }
    return new SessionId(id);
  }

  private validate(): void {
    if (!this.value || this.value.trim().length === 0) {
      throw new InvalidValueException('SessionId', 'cannot be empty');
    }
  }

  equals(other: SessionId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
