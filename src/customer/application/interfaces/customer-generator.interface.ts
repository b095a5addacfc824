import { CustomerDraft } from '../../domain/value-objects/customer-details.vo';

export abstract class CustomerGenerator {
  /** Returns exactly `count` drafts, with distinct emails inside the batch. */
  abstract generate(count: number): CustomerDraft[];
}
