export class CustomerEmailConflictException extends Error {
  constructor(readonly email: string) {
    super(`A customer with email '${email}' already exists`);
    this.name = 'CustomerEmailConflictException';
  }
}
