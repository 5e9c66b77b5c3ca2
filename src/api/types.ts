/**
 * Domain records decoded from the platform APIs.
 */

/** One end-user session listed by the billing API. */
export interface Conversation {
  id: string;
  contactUrn: string;
  /** Start of the session, passed back verbatim when listing its messages */
  startTime: string;
}

/** One turn of a conversation. Only agent turns carry traces. */
export interface Message {
  id: string;
  sourceType: string | null;
}

/** A list envelope whose list field may be absent. */
export interface Listing {
  records: unknown[];
  /** The response was an object without the list field */
  missingList: boolean;
}
