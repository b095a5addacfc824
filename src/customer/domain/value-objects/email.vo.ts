/** Address format rule shared by create and update; values are kept as entered. */
export class Email {
  static readonly MAX_LENGTH = 320;

  static isValid(email: string): boolean {
    const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
    return email.length <= Email.MAX_LENGTH && emailRegex.test(email);
  }
}
