import { Injectable } from '@nestjs/common';
import { CustomerGenerator } from '../../application/interfaces/customer-generator.interface';
import { CustomerDraft } from '../../domain/value-objects/customer-details.vo';
import wordLists from './random-customer.data.json';

function randomInt(min: number, maxExclusive: number): number {
  return min + Math.floor(Math.random() * (maxExclusive - min));
}

function pick<T>(items: readonly T[]): T {
  return items[randomInt(0, items.length)];
}

/**
 * Builds plausible customers from the word lists in
 * `random-customer.data.json`. Emails are `first.last@domain`, with the
 * batch index appended when that address was already handed out in the
 * same batch.
 */
@Injectable()
export class RandomCustomerGenerator implements CustomerGenerator {
  generate(count: number): CustomerDraft[] {
    const usedEmails = new Set<string>();
    const drafts: CustomerDraft[] = [];

    for (let index = 0; index < count; index++) {
      const firstName = pick(wordLists.firstNames);
      const lastName = pick(wordLists.lastNames);
      const email = this.uniqueEmail(firstName, lastName, index, usedEmails);
      usedEmails.add(email);

      drafts.push({
        name: `${firstName} ${lastName}`,
        email,
        phone: this.phoneNumber(),
        address: this.address(),
      });
    }

    return drafts;
  }

  private uniqueEmail(
    firstName: string,
    lastName: string,
    index: number,
    usedEmails: Set<string>,
  ): string {
    const local = `${firstName.toLowerCase()}.${lastName.toLowerCase()}`;
    const domain = pick(wordLists.emailDomains);
    const email = `${local}@${domain}`;
    return usedEmails.has(email) ? `${local}${index}@${domain}` : email;
  }

  // +1-XXX-XXX-XXXX
  private phoneNumber(): string {
    return `+1-${randomInt(200, 999)}-${randomInt(200, 999)}-${randomInt(1000, 9999)}`;
  }

  private address(): string {
    const streetNumber = randomInt(1, 9999);
    const street = pick(wordLists.streets);
    const city = pick(wordLists.cities);
    const state = pick(wordLists.states);
    const postalCode = randomInt(10000, 99999);
    const country = pick(wordLists.countries);
    return `${streetNumber} ${street}, ${city}, ${state} ${postalCode}, ${country}`;
  }
}
