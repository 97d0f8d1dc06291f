import { describe, it, expect } from 'vitest';
import { newTicketId } from '../ticketId';

describe('newTicketId', () => {
  it('is TKT- followed by 8 uppercase hex digits', () => {
    expect(newTicketId()).toMatch(/^TKT-[0-9A-F]{8}$/);
  });

  it('differs between calls', () => {
    expect(newTicketId()).not.toBe(newTicketId());
  });
});
