import { InvalidCredentialError } from './errors.js';

export interface PasswordPolicyOptions {
  minLength: number;
  maxLength: number;
  requireLetter: boolean;
  requireDigit: boolean;
  requireSymbol: boolean;
}

export const DEFAULT_PASSWORD_POLICY: PasswordPolicyOptions = {
  minLength: 6,
  maxLength: 200,
  requireLetter: false,
  requireDigit: false,
  requireSymbol: false,
};

export class PasswordPolicy {
  constructor(
    private readonly options: PasswordPolicyOptions = DEFAULT_PASSWORD_POLICY
  ) {}

  /**
   * List every rule the password breaks. Empty when it is acceptable.
   */
  violations(password: string): string[] {
    const { minLength, maxLength, requireLetter, requireDigit, requireSymbol } =
      this.options;
    const length = [...password].length;
    const violations: string[] = [];

    if (length < minLength) {
      violations.push(`Password must be at least ${minLength} characters`);
    }
    if (length > maxLength) {
      violations.push(`Password must be at most ${maxLength} characters`);
    }
    if (requireLetter && !/\p{L}/u.test(password)) {
      violations.push('Password must contain a letter');
    }
    if (requireDigit && !/\p{Nd}/u.test(password)) {
      violations.push('Password must contain a digit');
    }
    if (requireSymbol && !/[^\p{L}\p{Nd}]/u.test(password)) {
      violations.push('Password must contain a symbol');
    }

    return violations;
  }

  assertAcceptable(password: string): void {
    const violations = this.violations(password);
    if (violations.length > 0) {
      throw new InvalidCredentialError(violations);
    }
  }
}
