import { createLogger } from '@/shared/logging/logger';

export type DirectoryOrigin = 'config' | 'mdns';

export interface DirectoryEntry {
  jid: string;
  host: string;
  serial: string | null;
  name: string | null;
  model: string | null;
  origin: DirectoryOrigin;
}

/** Returns the members of the session the device leads, or null when it is not leading. */
export type SessionProvider = () => readonly string[] | null;

type DirectoryListener = (entry: DirectoryEntry) => void;

/**
 * JID → address lookup shared by every device runtime in the process.
 * Configured entries keep their address; discovered entries follow the latest announcement.
 */
export class DeviceDirectory {
  private readonly log = createLogger('Devices', 'Directory');
  private readonly entries = new Map<string, DirectoryEntry>();
  private readonly sessions = new Map<string, SessionProvider>();
  private readonly listeners = new Set<DirectoryListener>();

  public register(entry: DirectoryEntry): boolean {
    const existing = this.entries.get(entry.jid);
    if (existing?.origin === 'config' && entry.origin === 'mdns') {
      return false;
    }
    if (
      existing &&
      existing.host === entry.host &&
      existing.name === entry.name &&
      existing.origin === entry.origin
    ) {
      return false;
    }
    this.entries.set(entry.jid, { ...entry });
    this.log.debug(existing ? 'device address updated' : 'device registered', {
      jid: entry.jid,
      host: entry.host,
      origin: entry.origin,
    });
    for (const listener of this.listeners) {
      listener(entry);
    }
    return true;
  }

  public resolve(jid: string): DirectoryEntry | null {
    const entry = this.entries.get(jid);
    return entry ? { ...entry } : null;
  }

  public has(jid: string): boolean {
    return this.entries.has(jid);
  }

  public list(): DirectoryEntry[] {
    return [...this.entries.values()].map((entry) => ({ ...entry }));
  }

  /** Lets a locally managed leader expose its session so listeners can address every member. */
  public attachSession(leaderJid: string, provider: SessionProvider): () => void {
    this.sessions.set(leaderJid, provider);
    return () => {
      if (this.sessions.get(leaderJid) === provider) {
        this.sessions.delete(leaderJid);
      }
    };
  }

  public sessionOf(leaderJid: string): string[] | null {
    const members = this.sessions.get(leaderJid)?.();
    return members ? [...members] : null;
  }

  public subscribe(listener: DirectoryListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}
