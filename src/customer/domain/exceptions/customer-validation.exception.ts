export interface FieldViolation {
  field: string;
  message: string;
}

export class CustomerValidationException extends Error {
  constructor(readonly violations: FieldViolation[]) {
    super(violations.map((v) => v.message).join('; '));
    this.name = 'CustomerValidationException';
  }
}
