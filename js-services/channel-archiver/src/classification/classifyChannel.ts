import type { ArchivePolicy, ArchiveVerdict, Verdict } from '../types';

export const DAY_MS = 24 * 60 * 60 * 1000;

export interface ChannelSignals {
  isArchived: boolean;
  /** Milliseconds since the last message, null when it could not be determined */
  activityAgeMs: number | null;
  /** Domains of the members that resolved; unresolved members are left out */
  memberDomains: ReadonlySet<string>;
}

export type ClassificationPolicy = Pick<ArchivePolicy, 'targetDomains' | 'inactivityThresholdDays'>;

export function keepVerdict(
  reason: string,
  activityAgeMs: number | null = null,
  memberDomains: string[] = []
): Verdict {
  return { kind: 'keep', reason, activityAgeMs, memberDomains };
}

export function isArchiveVerdict(verdict: Verdict): verdict is ArchiveVerdict {
  return verdict.kind !== 'keep';
}

function isOrphaned(memberDomains: string[], targetDomains: readonly string[]): boolean {
  return (
    memberDomains.length > 0 &&
    memberDomains.every((domain) => targetDomains.includes(domain.toLowerCase()))
  );
}

/**
 * Decide whether a channel should be archived. Rules are checked in order and the first
 * match wins:
 *
 * 1. already archived: keep
 * 2. every resolvable member's domain is one of the target domains: archive by domain
 * 3. inactivity rule disabled, or last activity unknown: keep
 * 4. last activity older than the threshold: archive by inactivity
 *
 * An empty member set never matches the domain rule.
 */
export function classifyChannel(signals: ChannelSignals, policy: ClassificationPolicy): Verdict {
  const { activityAgeMs } = signals;
  const memberDomains = [...signals.memberDomains].sort();
  const details = { activityAgeMs, memberDomains };

  if (signals.isArchived) {
    return { kind: 'keep', reason: 'already archived', ...details };
  }

  if (isOrphaned(memberDomains, policy.targetDomains)) {
    return {
      kind: 'archive_by_domain',
      reason: `all members belong to ${memberDomains.join(', ')}`,
      ...details,
    };
  }

  const thresholdDays = policy.inactivityThresholdDays;
  if (thresholdDays === null) {
    return { kind: 'keep', reason: 'inactivity rule disabled', ...details };
  }

  if (activityAgeMs === null) {
    return { kind: 'keep', reason: 'activity unknown', ...details };
  }

  const ageDays = Math.floor(activityAgeMs / DAY_MS);
  if (activityAgeMs > thresholdDays * DAY_MS) {
    return {
      kind: 'archive_by_inactivity',
      reason: `no activity for ${ageDays} days (threshold ${thresholdDays} days)`,
      ...details,
    };
  }

  return { kind: 'keep', reason: `active within ${thresholdDays} days`, ...details };
}
