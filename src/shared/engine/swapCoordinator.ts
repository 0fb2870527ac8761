import type { Participant } from '../types/session';

/** One exchange: `a`'s role was swapped with `b`'s. */
export interface SwapPair {
  a: string;
  b: string;
}

export type SwapChain = SwapPair[];

export interface ExchangeOptions {
  /** Reversible exchanges record back-references; permanent ones clear them. */
  reversible: boolean;
}

/**
 * Adjacency view over the participants' swap back-references.
 *
 * Each participant holds exactly one link (`swappedWith`); a self-loop means
 * "not currently swapped". Links can form cycles (a reversible exchange links
 * both sides to each other), so every traversal carries a visited set.
 *
 * Only the worn identity moves between participants: role, board coordinate
 * and display metadata. Sequence numbers, turn order and every rule-side
 * membership (forfeited, winners, acted-this-cycle, counters) stay with the
 * participant id.
 */
export class SwapGraph {
  constructor(private readonly participants: Map<string, Participant>) {}

  public linkOf(participantId: string): string | null {
    return this.participants.get(participantId)?.swappedWith ?? null;
  }

  public isSwapped(participantId: string): boolean {
    const link = this.linkOf(participantId);
    return link !== null && link !== participantId;
  }

  /**
   * Exchange two participants' worn identities. Returns false when either
   * participant is unknown or both ids are the same.
   */
  public exchange(aId: string, bId: string, options: ExchangeOptions): boolean {
    const a = this.participants.get(aId);
    const b = this.participants.get(bId);
    if (!a || !b || aId === bId) {
      return false;
    }

    swapIdentity(a, b);

    if (options.reversible) {
      a.swappedWith = bId;
      b.swappedWith = aId;
    } else {
      a.swappedWith = aId;
      b.swappedWith = bId;
    }
    return true;
  }

  /**
   * Follow back-references from `startId`, producing the exchanges that led
   * to the current arrangement. Stops at a self-loop, a missing participant,
   * an exchange already recorded or the first node already visited.
   */
  public buildChain(startId: string): SwapChain {
    const chain: SwapChain = [];
    const visited = new Set<string>();
    const edges = new Set<string>();
    let current = startId;

    while (!visited.has(current)) {
      visited.add(current);
      const next = this.linkOf(current);
      if (next === null || next === current || !this.participants.has(next)) {
        break;
      }
      // A reversible exchange links both sides; the mutual pair is one exchange.
      const edge = current < next ? `${current}\u0000${next}` : `${next}\u0000${current}`;
      if (edges.has(edge)) {
        break;
      }
      edges.add(edge);
      chain.push({ a: current, b: next });
      current = next;
    }

    return chain;
  }

  /**
   * Undo a chain by replaying its exchanges in reverse order, then clear the
   * back-reference of every participant it touched.
   */
  public revertChain(chain: SwapChain): string[] {
    const touched = new Set<string>();

    for (let i = chain.length - 1; i >= 0; i--) {
      const { a: aId, b: bId } = chain[i];
      const a = this.participants.get(aId);
      const b = this.participants.get(bId);
      if (!a || !b) {
        continue;
      }
      swapIdentity(a, b);
      touched.add(aId);
      touched.add(bId);
    }

    for (const id of touched) {
      const participant = this.participants.get(id);
      if (participant) {
        participant.swappedWith = id;
      }
    }

    return [...touched];
  }
}

function swapIdentity(a: Participant, b: Participant): void {
  [a.role, b.role] = [b.role, a.role];
  [a.coordinate, b.coordinate] = [b.coordinate, a.coordinate];
  [a.display, b.display] = [b.display, a.display];
}
