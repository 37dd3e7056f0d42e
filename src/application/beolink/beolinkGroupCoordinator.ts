import type { DeviceApiPort } from '@/ports/DeviceApiPort';
import type { DeviceConfig } from '@/domain/config/types';
import type { BeolinkNotification, BeolinkPeerRef } from '@/domain/device/notifications';
import type { DeviceStateSnapshot } from '@/domain/device/state';
import { isPlaying } from '@/domain/device/playback';
import { isValidJid } from '@/domain/beolink/jid';
import { parseGroupCommand } from '@/domain/beolink/commands';
import { isBeolinkJoinSource, joinSourceForRequest } from '@/domain/beolink/sources';
import {
  STANDALONE,
  leaderJid,
  sameTopology,
  sessionMembers,
  snapshotTopology,
  topologyFromNotification,
  withListenersAdded,
  withListenersRemoved,
  type BeolinkTopology,
  type MembershipChange,
  type TopologySnapshot,
} from '@/domain/beolink/topology';
import {
  BeolinkError,
  BeolinkUnavailableError,
  InvalidGroupingTargetError,
  InvalidParameterError,
  NotALeaderError,
  RemoteCommandFailedError,
  type MemberResult,
} from '@/domain/errors';
import type { DeviceDirectory } from '@/application/devices/deviceDirectory';
import { executeGroupCommand, relativeVolumeTarget, volumeTarget } from '@/application/beolink/leaderCommands';
import { SerialQueue } from '@/shared/serialQueue';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type ExpandRequest = {
  jids?: readonly string[];
  allDiscovered?: boolean;
};

export type SessionResult = {
  results: MemberResult[];
  unresolved: string[];
};

export type GroupCoordinatorOptions = {
  device: Pick<DeviceConfig, 'serial' | 'host' | 'jid'>;
  api: DeviceApiPort;
  directory: DeviceDirectory;
  state: { snapshot(): DeviceStateSnapshot };
  onTopologyChanged: (snapshot: TopologySnapshot) => void;
  signal?: AbortSignal;
  log?: ComponentLogger;
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toRemoteFailure(label: string, error: unknown): BeolinkError {
  if (error instanceof BeolinkError) {
    return error;
  }
  const detail = describeError(error);
  return new RemoteCommandFailedError(`${label} failed: ${detail}`, null, detail, [], { cause: error });
}

/**
 * Owns the local device's Beolink role. Every operation runs through one queue; `beolink`
 * notifications are authoritative and bump a revision so an in-flight call never overwrites them.
 */
export class BeolinkGroupCoordinator {
  private readonly queue = new SerialQueue();
  private readonly log: ComponentLogger;
  private readonly selfJid: string;
  private readonly host: string;
  private topology: BeolinkTopology = STANDALONE;
  private membershipChange: MembershipChange = null;
  private revision = 0;

  constructor(private readonly options: GroupCoordinatorOptions) {
    this.selfJid = options.device.jid;
    this.host = options.device.host;
    this.log = options.log ?? createLogger('Beolink', 'Coordinator').child(null, { serial: options.device.serial });
  }

  public snapshot(): TopologySnapshot {
    return snapshotTopology(this.selfJid, this.topology, this.membershipChange);
  }

  public currentTopology(): BeolinkTopology {
    return this.topology;
  }

  /** Every device in the session, leader first. */
  public members(): string[] {
    if (this.topology.role === 'listening') {
      const leader = this.topology.leader.jid;
      const session = this.options.directory.sessionOf(leader);
      if (session && session.includes(this.selfJid)) {
        return session;
      }
      return [leader, this.selfJid];
    }
    return sessionMembers(this.selfJid, this.topology);
  }

  /** The session this device leads, or null when it is not leading. Never consults the directory. */
  public leadingSession(): string[] | null {
    return this.topology.role === 'leading' ? sessionMembers(this.selfJid, this.topology) : null;
  }

  public applyNotification(notification: BeolinkNotification): void {
    this.revision += 1;
    this.setTopology(topologyFromNotification(this.selfJid, notification), 'notification');
  }

  public join(targetJid?: string, sourceId?: string): Promise<void> {
    return this.queue.run(async () => {
      if (sourceId !== undefined && !isBeolinkJoinSource(sourceId)) {
        throw new InvalidParameterError(`${sourceId} is not a Beolink join source`);
      }
      if (targetJid === undefined) {
        if (sourceId !== undefined) {
          throw new InvalidParameterError('a join source requires a target jid');
        }
        await this.remote('join latest experience', () =>
          this.options.api.joinLatestBeolinkExperience(this.host, this.options.signal),
        );
        this.log.info('requested auto-join of the latest Beolink experience');
        return;
      }

      this.assertTargetFormat(targetJid);
      const leader = await this.resolveKnownPeer(targetJid);
      const revision = this.revision;
      const source = sourceId === undefined ? undefined : joinSourceForRequest(sourceId);
      await this.remote('join', () =>
        this.options.api.joinBeolinkPeer(this.host, targetJid, source, this.options.signal),
      );
      this.log.info('joined Beolink session', { leader: targetJid, source });
      if (this.revision === revision) {
        this.setTopology({ role: 'listening', leader }, 'join');
      }
    });
  }

  public expand(request: ExpandRequest): Promise<MemberResult[]> {
    return this.queue.run(async () => {
      if (this.topology.role === 'listening') {
        throw new NotALeaderError();
      }
      const hasJids = request.jids !== undefined;
      const allDiscovered = request.allDiscovered === true;
      if (hasJids === allDiscovered) {
        throw new InvalidParameterError('expand takes either jids or allDiscovered');
      }
      if (request.jids && request.jids.length === 0) {
        throw new InvalidParameterError('expand requires at least one jid');
      }
      this.assertExpandable();

      const candidates = request.jids
        ? [...request.jids]
        : (await this.discoverPeers()).map((peer) => peer.jid).filter((jid) => jid !== this.selfJid);
      candidates.forEach((jid) => this.assertTargetFormat(jid));
      const targets = [...new Set(candidates)];
      if (targets.length === 0) {
        this.log.info('expand found no peers');
        return [];
      }

      return this.changeMembership(
        'expanding',
        targets,
        (jid) => this.options.api.expandBeolink(this.host, jid, this.options.signal),
        (current) => withListenersAdded(this.selfJid, current, targets),
      );
    });
  }

  public unexpand(jids: readonly string[]): Promise<MemberResult[]> {
    return this.queue.run(async () => {
      const topology = this.topology;
      if (topology.role !== 'leading') {
        throw new NotALeaderError('device is not leading a session');
      }
      if (jids.length === 0) {
        throw new InvalidParameterError('unexpand requires at least one jid');
      }
      for (const jid of jids) {
        if (!topology.listeners.includes(jid)) {
          throw new InvalidGroupingTargetError(`${jid} is not a listener of this session`, jid);
        }
      }
      const targets = [...new Set(jids)];
      return this.changeMembership(
        'unexpanding',
        targets,
        (jid) => this.options.api.unexpandBeolink(this.host, jid, this.options.signal),
        (current) => withListenersRemoved(current, targets),
      );
    });
  }

  public leave(): Promise<void> {
    return this.queue.run(async () => {
      if (this.topology.role === 'standalone') {
        this.log.debug('leave ignored; device is standalone');
        return;
      }
      const revision = this.revision;
      await this.remote('leave', () => this.options.api.leaveBeolink(this.host, this.options.signal));
      if (this.revision === revision) {
        this.setTopology(STANDALONE, 'leave');
      }
    });
  }

  public allStandby(): Promise<SessionResult> {
    return this.queue.run(() =>
      this.fanOut('all standby', (host) => this.options.api.standby(host, this.options.signal)),
    );
  }

  public setVolume(level: number): Promise<SessionResult> {
    return this.queue.run(async () => {
      if (!Number.isFinite(level) || level < 0 || level > 1) {
        throw new InvalidParameterError(`volume level ${level} is outside 0..1`);
      }
      return this.fanOut('session volume', async (host) => {
        const volume = await this.options.api.getVolume(host, this.options.signal);
        await this.options.api.setVolumeLevel(host, volumeTarget(level, volume), this.options.signal);
      });
    });
  }

  public setRelativeVolume(delta: number): Promise<SessionResult> {
    return this.queue.run(async () => {
      if (!Number.isFinite(delta) || delta < -1 || delta > 1) {
        throw new InvalidParameterError(`relative volume ${delta} is outside -1..1`);
      }
      return this.fanOut('session relative volume', async (host) => {
        const volume = await this.options.api.getVolume(host, this.options.signal);
        await this.options.api.setVolumeLevel(
          host,
          relativeVolumeTarget(delta, volume),
          this.options.signal,
        );
      });
    });
  }

  /**
   * Validates `parameter` for `kind` and issues the command against the current leader only.
   */
  public async leaderCommand(kind: string, parameter?: unknown): Promise<{ leader: string }> {
    const command = parseGroupCommand(kind, parameter);
    return this.queue.run(async () => {
      const leader = leaderJid(this.selfJid, this.topology);
      const host = this.hostOf(leader);
      if (!host) {
        throw new InvalidGroupingTargetError(`leader ${leader} has no known address`, leader);
      }
      this.log.debug('issuing leader command', { command: command.kind, leader });
      await this.remote(command.kind, () =>
        executeGroupCommand(this.options.api, host, command, this.options.signal),
      );
      return { leader };
    });
  }

  /** Resolves once every operation queued so far has settled. */
  public idle(): Promise<void> {
    return this.queue.idle();
  }

  private setTopology(next: BeolinkTopology, reason: string): void {
    if (sameTopology(this.topology, next)) {
      return;
    }
    this.topology = next;
    this.log.info('Beolink topology changed', {
      reason,
      role: next.role,
      leader: next.role === 'listening' ? next.leader.jid : null,
      listeners: next.role === 'leading' ? next.listeners.length : 0,
    });
    this.options.onTopologyChanged(this.snapshot());
  }

  private assertTargetFormat(jid: string): void {
    if (!isValidJid(jid)) {
      throw new InvalidGroupingTargetError(`${jid} is not a valid Beolink JID`, jid);
    }
    if (jid === this.selfJid) {
      throw new InvalidGroupingTargetError('a device cannot group with itself', jid);
    }
  }

  private async resolveKnownPeer(jid: string): Promise<BeolinkPeerRef> {
    const entry = this.options.directory.resolve(jid);
    if (entry) {
      return entry.name ? { jid, friendlyName: entry.name } : { jid };
    }
    const peer = (await this.discoverPeers()).find((candidate) => candidate.jid === jid);
    if (!peer) {
      throw new InvalidGroupingTargetError(`${jid} is not a known Beolink device`, jid);
    }
    return { jid, friendlyName: peer.friendlyName };
  }

  private discoverPeers(): Promise<{ jid: string; friendlyName: string }[]> {
    return this.remote('list peers', () =>
      this.options.api.getBeolinkPeers(this.host, this.options.signal),
    );
  }

  private assertExpandable(): void {
    const { source, playback } = this.options.state.snapshot();
    if (source && source.isMultiroomAvailable === false) {
      throw new BeolinkUnavailableError(`source ${source.id} cannot be shared with Beolink`);
    }
    if (playback.state !== 'unknown' && !isPlaying(playback.state)) {
      throw new BeolinkUnavailableError(`device must be playing to expand (state ${playback.state})`);
    }
  }

  /**
   * Runs one membership call per JID in order. Subscribers see a snapshot carrying the
   * transient marker on entry and another on exit; the topology only moves when every
   * call succeeded and no notification arrived meanwhile.
   */
  private async changeMembership(
    change: Exclude<MembershipChange, null>,
    jids: readonly string[],
    call: (jid: string) => Promise<void>,
    update: (current: BeolinkTopology) => BeolinkTopology,
  ): Promise<MemberResult[]> {
    const label = change === 'expanding' ? 'expand' : 'unexpand';
    const revision = this.revision;
    let next: BeolinkTopology | null = null;
    this.membershipChange = change;
    this.options.onTopologyChanged(this.snapshot());
    try {
      const results: MemberResult[] = [];
      for (const jid of jids) {
        results.push(await this.attempt(jid, () => call(jid)));
      }
      if (results.every((result) => result.ok) && this.revision === revision) {
        next = update(this.topology);
      }
      this.throwOnFailures(label, results);
      return results;
    } finally {
      this.membershipChange = null;
      if (next && !sameTopology(this.topology, next)) {
        this.setTopology(next, label);
      } else {
        this.options.onTopologyChanged(this.snapshot());
      }
    }
  }

  private async attempt(jid: string, call: () => Promise<void>): Promise<MemberResult> {
    try {
      await call();
      return { jid, ok: true };
    } catch (error) {
      this.log.warn('Beolink member call failed', { jid, message: describeError(error) });
      return { jid, ok: false, error: describeError(error) };
    }
  }

  private async fanOut(label: string, call: (host: string) => Promise<void>): Promise<SessionResult> {
    const results: MemberResult[] = [];
    const unresolved: string[] = [];
    for (const jid of this.members()) {
      const host = this.hostOf(jid);
      if (!host) {
        unresolved.push(jid);
        continue;
      }
      results.push(await this.attempt(jid, () => call(host)));
    }
    if (unresolved.length > 0) {
      this.log.warn(`${label}: session members without a known address`, { unresolved });
    }
    this.throwOnFailures(label, results);
    return { results, unresolved };
  }

  private hostOf(jid: string): string | null {
    if (jid === this.selfJid) {
      return this.host;
    }
    return this.options.directory.resolve(jid)?.host ?? null;
  }

  private throwOnFailures(label: string, results: readonly MemberResult[]): void {
    const failed = results.filter((result) => !result.ok);
    if (failed.length === 0) {
      return;
    }
    const detail = failed.map((result) => `${result.jid}: ${result.error ?? 'failed'}`).join('; ');
    throw new RemoteCommandFailedError(
      `${label} failed for ${failed.length} of ${results.length} devices`,
      null,
      detail,
      results,
    );
  }

  private async remote<T>(label: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw toRemoteFailure(label, error);
    }
  }
}
