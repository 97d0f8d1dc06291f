import { v4 as uuidv4 } from 'uuid';

/** `TKT-` followed by the first 8 hex digits of a v4 UUID, uppercased. */
export function newTicketId(): string {
  return `TKT-${uuidv4().slice(0, 8).toUpperCase()}`;
}
