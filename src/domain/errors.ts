export type BeolinkErrorCode =
  | 'connection_lost'
  | 'malformed_notification'
  | 'invalid_grouping_target'
  | 'not_a_leader'
  | 'invalid_parameter'
  | 'beolink_unavailable'
  | 'remote_command_failed';

/**
 * Base class for every failure surfaced by the device runtime or the group operations.
 */
export class BeolinkError extends Error {
  constructor(
    public readonly code: BeolinkErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConnectionLostError extends BeolinkError {
  constructor(message = 'notification stream lost', options?: { cause?: unknown }) {
    super('connection_lost', message, options);
  }
}

export class MalformedNotificationError extends BeolinkError {
  constructor(
    message: string,
    public readonly frame: string,
  ) {
    super('malformed_notification', message);
  }
}

export class InvalidGroupingTargetError extends BeolinkError {
  constructor(
    message: string,
    public readonly jid: string | null = null,
  ) {
    super('invalid_grouping_target', message);
  }
}

export class NotALeaderError extends BeolinkError {
  constructor(message = 'device is listening to another session') {
    super('not_a_leader', message);
  }
}

export class InvalidParameterError extends BeolinkError {
  constructor(message: string) {
    super('invalid_parameter', message);
  }
}

export class BeolinkUnavailableError extends BeolinkError {
  constructor(message: string) {
    super('beolink_unavailable', message);
  }
}

/** Outcome of one membership call inside a multi-device operation. */
export type MemberResult = {
  jid: string;
  ok: boolean;
  error?: string;
};

export class RemoteCommandFailedError extends BeolinkError {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly detail: string,
    public readonly results: readonly MemberResult[] = [],
    options?: { cause?: unknown },
  ) {
    super('remote_command_failed', message, options);
  }
}
