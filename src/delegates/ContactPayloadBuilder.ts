// src/delegates/ContactPayloadBuilder.ts
import type { BrevoContact, ContactAttributes } from '../contracts/domain';
import { ContactValidationError } from '../contracts/errors';

export type BrevoContactBody = {
  email: string;
  updateEnabled: boolean;
  listIds?: number[];
  attributes?: ContactAttributes;
};

export function makeContact(input: {
  email: string;
  listIds?: number[];
  attributes?: ContactAttributes;
  updateEnabled?: boolean;
}): BrevoContact {
  return {
    email: input.email,
    listIds: input.listIds ?? [],
    attributes: input.attributes ?? {},
    updateEnabled: input.updateEnabled ?? true,
  };
}

/**
 * Builds the POST /contacts body. listIds and attributes are left out when empty,
 * since the API may reject empty collections.
 */
export function buildContactBody(contact: BrevoContact): BrevoContactBody {
  if (typeof contact.email !== 'string' || contact.email.trim().length === 0) {
    throw new ContactValidationError('contact email is required');
  }
  for (const id of contact.listIds) {
    if (!Number.isInteger(id) || id <= 0) {
      throw new ContactValidationError(`list id must be a positive integer, got ${String(id)}`);
    }
  }

  const body: BrevoContactBody = {
    email: contact.email,
    updateEnabled: contact.updateEnabled,
  };
  if (contact.listIds.length > 0) body.listIds = [...contact.listIds];
  if (Object.keys(contact.attributes).length > 0) body.attributes = { ...contact.attributes };
  return body;
}
