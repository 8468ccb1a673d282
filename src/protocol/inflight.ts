export interface InflightTicket {
  readonly id: number;
  readonly method: string;
  /** Requests sharing a class key supersede each other */
  readonly classKey: string;
  /** Overlay epoch at issue time; undefined when not issued from the overlay */
  readonly epoch: number | undefined;
  readonly supersedes: boolean;
}

/**
 * Correlates replies with the requests that caused them. A reply is stale when
 * a newer request of its class was issued or its overlay has closed since.
 */
export class InflightRegistry {
  private nextId = 1;
  private readonly latest = new Map<string, number>();
  private readonly pending = new Map<number, InflightTicket>();

  begin(method: string, classKey: string, opts?: { epoch?: number; supersedes?: boolean }): InflightTicket {
    const ticket: InflightTicket = {
      id: this.nextId++,
      method,
      classKey,
      epoch: opts?.epoch,
      supersedes: opts?.supersedes ?? true,
    };
    this.pending.set(ticket.id, ticket);
    if (ticket.supersedes) this.latest.set(classKey, ticket.id);
    return ticket;
  }

  /** Retire the ticket; true when its reply may still be applied. */
  settle(ticket: InflightTicket, currentEpoch: number): boolean {
    if (!this.pending.delete(ticket.id)) return false;
    if (ticket.epoch !== undefined && ticket.epoch !== currentEpoch) return false;
    if (ticket.supersedes && this.latest.get(ticket.classKey) !== ticket.id) return false;
    if (ticket.supersedes) this.latest.delete(ticket.classKey);
    return true;
  }

  isPending(id: number): boolean {
    return this.pending.has(id);
  }

  get size(): number {
    return this.pending.size;
  }

  /** Every outstanding reply becomes stale. */
  clear(): void {
    this.pending.clear();
    this.latest.clear();
  }
}
