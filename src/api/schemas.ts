/**
 * Zod schemas for the platform API payloads.
 *
 * Envelopes (pages, listings) are decoded by the client; individual records
 * are decoded one by one by the pipeline so that a single bad record never
 * costs its neighbours.
 */

import { z } from 'zod';
import type { Conversation, Listing, Message } from './types.js';

const idSchema = z.union([z.string().min(1), z.number()]).transform((id) => String(id));

const optionalText = z.string().nullish();

/**
 * A list response: either a bare array or an object whose `results` holds the
 * records. An object without `results` decodes as an empty listing.
 */
export const ListingSchema = z
  .union([
    z.array(z.unknown()),
    z
      .object({
        results: z.array(z.unknown()).nullish(),
      })
      .passthrough(),
  ])
  .transform((body): Listing => {
    if (Array.isArray(body)) return { records: body, missingList: false };
    return { records: body.results ?? [], missingList: body.results == null };
  });

/**
 * Conversation record. The billing API has shipped both
 * `contact_urn`/`start_time` and `urn`/`created_on`; either pair is accepted.
 */
export const ConversationSchema = z
  .object({
    id: idSchema,
    contact_urn: optionalText,
    urn: optionalText,
    start_time: optionalText,
    created_on: optionalText,
  })
  .passthrough()
  .transform((record, ctx): Conversation => {
    const contactUrn = record.contact_urn || record.urn;
    const startTime = record.start_time || record.created_on;
    if (!contactUrn) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['contact_urn'], message: 'contact URN is missing' });
    }
    if (!startTime) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['start_time'], message: 'start time is missing' });
    }
    return { id: record.id, contactUrn: contactUrn ?? '', startTime: startTime ?? '' };
  });

export const MessageSchema = z
  .object({
    id: idSchema,
    source_type: optionalText,
  })
  .passthrough()
  .transform((record): Message => ({ id: record.id, sourceType: record.source_type ?? null }));
