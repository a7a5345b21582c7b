/**
 * Retention policy logic
 *
 * Planning is a pure function of the record snapshot and the policy: the same
 * input always yields the same keep/delete split, and nothing is mutated.
 */

import type { BackupMetadata, RetentionPolicy } from "../../types";
import { IntegrityError } from "../../utils/errors";

export type RetentionTier = "daily" | "weekly" | "monthly" | "yearly";

export type KeepReason = RetentionTier | "minimum";

export interface RetentionDecision {
  backup: BackupMetadata;
  keep: boolean;
  /** The rule that first kept the record, or null when it is deleted */
  keptBy: KeepReason | null;
}

export interface RetentionPlan {
  /** One decision per record, newest first */
  decisions: RetentionDecision[];
  keep: BackupMetadata[];
  delete: BackupMetadata[];
  /** How many records short of `minBackups` the configuration is, even keeping everything */
  minimumShortfall: number;
}

const TIERS: ReadonlyArray<{ tier: RetentionTier; quota: keyof RetentionPolicy }> = [
  { tier: "daily", quota: "keepDaily" },
  { tier: "weekly", quota: "keepWeekly" },
  { tier: "monthly", quota: "keepMonthly" },
  { tier: "yearly", quota: "keepYearly" },
];

const DAY_MS = 24 * 60 * 60 * 1000;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * ISO-8601 week key (`YYYY-Www`) in UTC. The week belongs to the year of its
 * Thursday, so early-January days can land in the previous year's last week.
 */
export function isoWeekKey(date: Date): string {
  const day = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  const weekday = (new Date(day).getUTCDay() + 6) % 7; // Monday = 0
  const thursday = new Date(day + (3 - weekday) * DAY_MS);
  const year = thursday.getUTCFullYear();
  const week = Math.ceil(((thursday.getTime() - Date.UTC(year, 0, 1)) / DAY_MS + 1) / 7);
  return `${year}-W${pad(week)}`;
}

export function bucketKey(tier: RetentionTier, date: Date): string {
  const year = String(date.getUTCFullYear());
  switch (tier) {
    case "daily":
      return `${year}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
    case "weekly":
      return isoWeekKey(date);
    case "monthly":
      return `${year}-${pad(date.getUTCMonth() + 1)}`;
    case "yearly":
      return year;
  }
}

function parseCreatedAt(backup: BackupMetadata): Date {
  const date = new Date(backup.created_at);
  if (Number.isNaN(date.getTime())) {
    throw new IntegrityError(`Backup ${backup.id} has an invalid created_at: ${backup.created_at}`);
  }
  return date;
}

function quotaOf(policy: RetentionPolicy, key: keyof RetentionPolicy): number {
  return Math.max(0, Math.floor(policy[key]));
}

/**
 * Newest first by creation time; ties broken by id, descending.
 */
export function sortNewestFirst(backups: readonly BackupMetadata[]): BackupMetadata[] {
  const times = new Map(backups.map((b) => [b.id, parseCreatedAt(b).getTime()]));
  return [...backups].sort((a, b) => {
    const diff = (times.get(b.id) ?? 0) - (times.get(a.id) ?? 0);
    if (diff !== 0) return diff;
    return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
  });
}

/**
 * Decide which backups of one configuration survive the policy.
 *
 * Tiers run daily, weekly, monthly, yearly. Walking newest first, the first
 * record seen in each bucket claims it; a record not yet kept is kept and
 * uses one of the tier's slots, a record kept by an earlier tier claims the
 * bucket for free. The keep-set is then topped up with the newest remaining
 * records until it holds at least `minBackups`.
 */
export function planRetention(
  backups: readonly BackupMetadata[],
  policy: RetentionPolicy,
): RetentionPlan {
  const sorted = sortNewestFirst(backups);
  const dates = sorted.map(parseCreatedAt);
  const keptBy = new Map<string, KeepReason>();

  for (const { tier, quota } of TIERS) {
    let slots = quotaOf(policy, quota);
    const claimed = new Set<string>();

    for (let i = 0; i < sorted.length && slots > 0; i++) {
      const backup = sorted[i];
      const date = dates[i];
      if (!backup || !date) continue;

      const key = bucketKey(tier, date);
      if (claimed.has(key)) continue;
      claimed.add(key);

      if (!keptBy.has(backup.id)) {
        keptBy.set(backup.id, tier);
        slots--;
      }
    }
  }

  const minimum = quotaOf(policy, "minBackups");
  for (const backup of sorted) {
    if (keptBy.size >= minimum) break;
    if (!keptBy.has(backup.id)) {
      keptBy.set(backup.id, "minimum");
    }
  }

  const decisions = sorted.map((backup): RetentionDecision => {
    const reason = keptBy.get(backup.id) ?? null;
    return { backup, keep: reason !== null, keptBy: reason };
  });

  return {
    decisions,
    keep: decisions.filter((d) => d.keep).map((d) => d.backup),
    delete: decisions.filter((d) => !d.keep).map((d) => d.backup),
    minimumShortfall: Math.max(0, minimum - sorted.length),
  };
}
