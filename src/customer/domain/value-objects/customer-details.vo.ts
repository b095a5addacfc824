import {
  CustomerValidationException,
  FieldViolation,
} from '../exceptions/customer-validation.exception';
import { Email } from './email.vo';

export interface CustomerDraft {
  name: string;
  email: string;
  phone?: string | null;
  address?: string | null;
}

const PHONE_PATTERN = /^[0-9+\-().\s]+$/;

function blankToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}

/**
 * The user-editable part of a customer, trimmed and checked against the
 * column limits. Construction fails with every violation found, not just
 * the first one.
 */
export class CustomerDetails {
  static readonly NAME_MAX_LENGTH = 100;
  static readonly PHONE_MAX_LENGTH = 20;
  static readonly ADDRESS_MAX_LENGTH = 500;

  readonly name: string;
  readonly email: string;
  readonly phone: string | null;
  readonly address: string | null;

  constructor(draft: CustomerDraft) {
    const violations: FieldViolation[] = [];

    const name = draft.name.trim();
    if (name === '') {
      violations.push({ field: 'name', message: 'Name is required' });
    } else if (name.length > CustomerDetails.NAME_MAX_LENGTH) {
      violations.push({
        field: 'name',
        message: `Name cannot exceed ${CustomerDetails.NAME_MAX_LENGTH} characters`,
      });
    }

    const email = draft.email.trim();
    if (email === '') {
      violations.push({ field: 'email', message: 'Email is required' });
    } else if (!Email.isValid(email)) {
      violations.push({ field: 'email', message: 'Invalid email format' });
    }

    const phone = blankToNull(draft.phone);
    if (phone !== null) {
      if (phone.length > CustomerDetails.PHONE_MAX_LENGTH) {
        violations.push({
          field: 'phone',
          message: `Phone cannot exceed ${CustomerDetails.PHONE_MAX_LENGTH} characters`,
        });
      } else if (!PHONE_PATTERN.test(phone)) {
        violations.push({ field: 'phone', message: 'Invalid phone format' });
      }
    }

    const address = blankToNull(draft.address);
    if (
      address !== null &&
      address.length > CustomerDetails.ADDRESS_MAX_LENGTH
    ) {
      violations.push({
        field: 'address',
        message: `Address cannot exceed ${CustomerDetails.ADDRESS_MAX_LENGTH} characters`,
      });
    }

    if (violations.length > 0) {
      throw new CustomerValidationException(violations);
    }

    this.name = name;
    this.email = email;
    this.phone = phone;
    this.address = address;
  }
}
