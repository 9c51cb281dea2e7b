import { v4 as uuidv4 } from 'uuid';

import type { ContactInfo, FaqEntry, Ticket } from './types.js';

export interface FaqRepository {
  lookup(topic: string): FaqEntry | undefined;
  contact(): ContactInfo;
}

export interface TicketDesk {
  create(subject: string, description: string): Ticket;
}

export class InMemoryFaqRepository implements FaqRepository {
  constructor(
    private readonly entries: FaqEntry[],
    private readonly contactInfo: ContactInfo
  ) {}

  lookup(topic: string): FaqEntry | undefined {
    const needle = topic.toLowerCase();
    return this.entries.find(entry =>
      [entry.key, ...entry.aliases].some(key => needle.includes(key.toLowerCase())));
  }

  contact(): ContactInfo {
    return { ...this.contactInfo };
  }
}

interface TicketRecord {
  ticket: Ticket;
  description: string;
}

export class InMemoryTicketDesk implements TicketDesk {
  private records: TicketRecord[] = [];

  create(subject: string, description: string): Ticket {
    const ticketId = `TKT-${uuidv4().slice(0, 8).toUpperCase()}`;
    const ticket: Ticket = {
      ticket_id: ticketId,
      subject,
      status: 'open',
      message: `Support ticket ${ticketId} created. Our team will respond within 24 hours.`
    };
    this.records.push({ ticket, description });
    return ticket;
  }

  get openTickets(): readonly Ticket[] {
    return this.records.map(record => record.ticket);
  }
}
