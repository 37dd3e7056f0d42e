import type { BeolinkNotification, BeolinkPeerRef } from '@/domain/device/notifications';

/**
 * The local device's role in a Beolink session. Leading and listening exclude each other.
 */
export type BeolinkTopology =
  | { role: 'standalone' }
  | { role: 'leading'; listeners: readonly string[]; sourceId?: string }
  | { role: 'listening'; leader: BeolinkPeerRef };

export type MembershipChange = 'expanding' | 'unexpanding' | null;

export interface TopologySnapshot {
  role: BeolinkTopology['role'];
  leader: string | null;
  listeners: string[];
  sourceId: string | null;
  membershipChange: MembershipChange;
}

export const STANDALONE: BeolinkTopology = { role: 'standalone' };

function uniqueJids(jids: Iterable<string>, exclude: string): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const jid of jids) {
    if (jid === exclude || seen.has(jid)) continue;
    seen.add(jid);
    ordered.push(jid);
  }
  return ordered;
}

/**
 * Maps an authoritative `beolink` notification onto the local device's role.
 * A leader equal to the local JID means the device leads the reported listeners.
 */
export function topologyFromNotification(
  selfJid: string,
  notification: BeolinkNotification,
): BeolinkTopology {
  const { leader } = notification;
  if (leader && leader.jid !== selfJid) {
    return { role: 'listening', leader };
  }
  const listeners = uniqueJids(
    notification.listeners.map((peer) => peer.jid),
    selfJid,
  );
  if (listeners.length === 0) {
    return STANDALONE;
  }
  return notification.sourceId === undefined
    ? { role: 'leading', listeners }
    : { role: 'leading', listeners, sourceId: notification.sourceId };
}

export function withListenersAdded(
  selfJid: string,
  topology: BeolinkTopology,
  jids: readonly string[],
): BeolinkTopology {
  const current = topology.role === 'leading' ? topology.listeners : [];
  const listeners = uniqueJids([...current, ...jids], selfJid);
  if (listeners.length === 0) return STANDALONE;
  const sourceId = topology.role === 'leading' ? topology.sourceId : undefined;
  return sourceId === undefined ? { role: 'leading', listeners } : { role: 'leading', listeners, sourceId };
}

export function withListenersRemoved(
  topology: BeolinkTopology,
  jids: readonly string[],
): BeolinkTopology {
  if (topology.role !== 'leading') return topology;
  const removed = new Set(jids);
  const listeners = topology.listeners.filter((jid) => !removed.has(jid));
  if (listeners.length === 0) return STANDALONE;
  return { ...topology, listeners };
}

/** Leader first, then listeners in join order; the local device alone when standalone. */
export function sessionMembers(selfJid: string, topology: BeolinkTopology): string[] {
  switch (topology.role) {
    case 'standalone':
      return [selfJid];
    case 'leading':
      return [selfJid, ...topology.listeners];
    case 'listening':
      return [topology.leader.jid, selfJid];
  }
}

export function leaderJid(selfJid: string, topology: BeolinkTopology): string {
  return topology.role === 'listening' ? topology.leader.jid : selfJid;
}

export function sameTopology(left: BeolinkTopology, right: BeolinkTopology): boolean {
  if (left.role !== right.role) return false;
  if (left.role === 'listening' && right.role === 'listening') {
    return left.leader.jid === right.leader.jid;
  }
  if (left.role === 'leading' && right.role === 'leading') {
    return (
      left.sourceId === right.sourceId &&
      left.listeners.length === right.listeners.length &&
      left.listeners.every((jid, index) => right.listeners[index] === jid)
    );
  }
  return true;
}

export function snapshotTopology(
  selfJid: string,
  topology: BeolinkTopology,
  membershipChange: MembershipChange,
): TopologySnapshot {
  switch (topology.role) {
    case 'standalone':
      return { role: 'standalone', leader: null, listeners: [], sourceId: null, membershipChange };
    case 'leading':
      return {
        role: 'leading',
        leader: selfJid,
        listeners: [...topology.listeners],
        sourceId: topology.sourceId ?? null,
        membershipChange,
      };
    case 'listening':
      return {
        role: 'listening',
        leader: topology.leader.jid,
        listeners: [],
        sourceId: null,
        membershipChange,
      };
  }
}
