/**
 * Auto-record policy engine.
 *
 * Turns a stream of channel live/offline events into the set of
 * channels that should be recording. Mode decides which channels are
 * candidates, the blocklist always wins, a channel must stay live for
 * the debounce window before it is wanted, and a channel that went
 * offline is held back for the cooldown window.
 */

import { normalizeChannels, normalizeLogin } from "../channels.js";
import {
  buildDesiredState,
  type SyncDesiredStateInput,
} from "../desired-state.js";
import type { AgentChannel, DesiredState } from "../types/index.js";

export const AUTO_RECORD_MODES = [
  "onlyPinned",
  "onlyFollowed",
  "pinnedAndFollowed",
  "customAllowlist",
] as const;

export type AutoRecordMode = (typeof AUTO_RECORD_MODES)[number];

export interface AutoRecordPolicy {
  enabled: boolean;
  mode: AutoRecordMode;

  /** Logins eligible in customAllowlist mode */
  allowlist: readonly string[];

  /** Logins never recorded, whatever the mode */
  blocklist: readonly string[];

  debounceSeconds: number;

  /** 0 disables the cooldown */
  cooldownSeconds: number;
}

export const DEFAULT_AUTO_RECORD_POLICY: AutoRecordPolicy = {
  enabled: true,
  mode: "onlyPinned",
  allowlist: [],
  blocklist: [],
  debounceSeconds: 1,
  cooldownSeconds: 30,
};

export interface ChannelEvent {
  login: string;
  displayName?: string;
  isLive: boolean;
  pinned: boolean;
  followed: boolean;
}

interface ChannelState {
  login: string;
  displayName?: string;
  pinned: boolean;
  followed: boolean;
  liveSince: Date | null;
  offlineAt: Date | null;
}

export function isAutoRecordMode(value: string): value is AutoRecordMode {
  return AUTO_RECORD_MODES.some((mode) => mode === value);
}

function loginSet(logins: readonly string[]): Set<string> {
  const set = new Set<string>();
  for (const login of logins) {
    const normalized = normalizeLogin(login);
    if (normalized !== null) set.add(normalized);
  }
  return set;
}

export class AutoRecordPolicyEngine {
  private policy: AutoRecordPolicy;
  private allowlist: Set<string>;
  private blocklist: Set<string>;
  private readonly channels = new Map<string, ChannelState>();
  private readonly clock: () => Date;

  constructor(policy: Partial<AutoRecordPolicy> = {}, clock: () => Date = () => new Date()) {
    this.policy = { ...DEFAULT_AUTO_RECORD_POLICY, ...policy };
    this.allowlist = loginSet(this.policy.allowlist);
    this.blocklist = loginSet(this.policy.blocklist);
    this.clock = clock;
  }

  get currentPolicy(): AutoRecordPolicy {
    return this.policy;
  }

  updatePolicy(changes: Partial<AutoRecordPolicy>): void {
    this.policy = { ...this.policy, ...changes };
    this.allowlist = loginSet(this.policy.allowlist);
    this.blocklist = loginSet(this.policy.blocklist);
  }

  /** Record a channel observation. Blank logins are ignored. */
  handleEvent(event: ChannelEvent, at: Date = this.clock()): void {
    const login = normalizeLogin(event.login);
    if (login === null) return;

    const state: ChannelState = this.channels.get(login) ?? {
      login,
      pinned: false,
      followed: false,
      liveSince: null,
      offlineAt: null,
    };
    state.pinned = event.pinned;
    state.followed = event.followed;
    const displayName = event.displayName?.trim();
    if (displayName) state.displayName = displayName;

    if (event.isLive) {
      if (state.liveSince === null) state.liveSince = at;
    } else if (state.liveSince !== null) {
      state.liveSince = null;
      state.offlineAt = at;
    }
    this.channels.set(login, state);
  }

  /** Drop everything known about a channel */
  forget(login: string): void {
    const normalized = normalizeLogin(login);
    if (normalized !== null) this.channels.delete(normalized);
  }

  private matchesMode(state: ChannelState): boolean {
    switch (this.policy.mode) {
      case "onlyPinned":
        return state.pinned;
      case "onlyFollowed":
        return state.followed;
      case "pinnedAndFollowed":
        return state.pinned || state.followed;
      case "customAllowlist":
        return this.allowlist.has(state.login);
    }
  }

  private isWanted(state: ChannelState, now: Date): boolean {
    if (this.blocklist.has(state.login) || !this.matchesMode(state)) {
      return false;
    }
    if (state.liveSince === null) return false;
    if (now.getTime() - state.liveSince.getTime() < this.policy.debounceSeconds * 1000) {
      return false;
    }
    if (
      state.offlineAt !== null &&
      now.getTime() - state.offlineAt.getTime() < this.policy.cooldownSeconds * 1000
    ) {
      return false;
    }
    return true;
  }

  /** Channels that should be recording now, normalized and sorted */
  desiredChannels(now: Date = this.clock()): AgentChannel[] {
    if (!this.policy.enabled) return [];
    const wanted: AgentChannel[] = [];
    for (const state of this.channels.values()) {
      if (!this.isWanted(state, now)) continue;
      wanted.push(
        state.displayName
          ? { login: state.login, displayName: state.displayName }
          : { login: state.login }
      );
    }
    return normalizeChannels(wanted);
  }

  /** Desired state for the background agent */
  toDesiredState(
    base: Omit<SyncDesiredStateInput, "enabled" | "channels">,
    now: Date = this.clock()
  ): DesiredState {
    return buildDesiredState({
      ...base,
      enabled: this.policy.enabled,
      channels: this.desiredChannels(now),
    });
  }
}
