/**
 * A channel as listed by the workspace. Fields the API did not return are null.
 */
export interface Channel {
  id: string;
  name: string | null;
  createdAt: Date | null;
  isArchived: boolean | null;
  isPrivate: boolean | null;
}

export interface ChannelMessage {
  ts: string;
  postedAt: Date;
  subtype: string | null;
}

export interface WorkspaceUser {
  id: string;
  email: string | null;
  isBot: boolean;
  isDeleted: boolean;
}

/**
 * Immutable settings for one sweep. Build it with createArchivePolicy().
 */
export interface ArchivePolicy {
  readonly targetDomains: readonly string[];
  /** null disables the inactivity rule */
  readonly inactivityThresholdDays: number | null;
  readonly live: boolean;
  readonly joinChannels: boolean;
  readonly includePrivate: boolean;
  /** Number of recent messages fetched when looking for the last activity */
  readonly historyLookback: number;
}

export type VerdictKind = 'keep' | 'archive_by_domain' | 'archive_by_inactivity';

interface VerdictDetails {
  reason: string;
  /** Milliseconds since the last message, null when unknown */
  activityAgeMs: number | null;
  /** Sorted domains of the resolvable members */
  memberDomains: string[];
}

export type Verdict =
  | (VerdictDetails & { kind: 'keep' })
  | (VerdictDetails & { kind: 'archive_by_domain' })
  | (VerdictDetails & { kind: 'archive_by_inactivity' });

export type ArchiveVerdict = Extract<Verdict, { kind: 'archive_by_domain' | 'archive_by_inactivity' }>;

export type ArchiveAction = 'none' | 'simulated' | 'archived' | 'failed';

export interface RunResultRecord {
  channelId: string;
  channelName: string | null;
  verdict: Verdict;
  action: ArchiveAction;
  error: string | null;
}
