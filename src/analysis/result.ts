/** Severity levels, lowest first. Position in this list is the ordering. */
export const CHECK_STATUSES = ["NONE", "GREEN", "YELLOW", "RED"] as const;
export type CheckStatus = (typeof CHECK_STATUSES)[number];

/** Diagnostic codes raised by the checks. Spellings are a stable contract. */
export const CHECK_MESSAGES = [
  "OBSOLETE",
  "ALONGSIDE",
  "NOVERSION",
  "MULTIVERSION",
  "NOSTORIES",
  "NODESCRIPTION",
  "NOTREADY",
  "NOACKS",
  "NODELIVERYOWNER",
  "NOQEMISMATCH",
  "NOQEASSIGNEE",
  "NOCRITERIA",
  "NOPRIORITY",
  "NOTSTARTED",
  "IMPEDIMENT",
  "NOMARKETPROBLEM",
  "ISSUENOCOMPONENT",
  "MULTICOMPONENT",
  "NOTDONE",
  "NOACTIVESTORIES",
  "NOEPIC",
  "NOSTATUSCOMMENT",
  "NODESIGN",
] as const;
export type CheckMessage = (typeof CHECK_MESSAGES)[number];

/** Positive when `a` is more severe than `b`. */
export function compareStatus(a: CheckStatus, b: CheckStatus): number {
  return CHECK_STATUSES.indexOf(a) - CHECK_STATUSES.indexOf(b);
}

/** Plain, serializable view of a CheckResult */
export interface CheckVerdict {
  ready: boolean;
  status: CheckStatus;
  messages: CheckMessage[];
}

/**
 * Verdict accumulator for one issue. `ready` can only go from true to false
 * and `status` can only rise, so the order checks run in changes nothing but
 * the order of `messages`.
 */
export class CheckResult {
  private _ready = true;
  private _status: CheckStatus = "NONE";
  private readonly _messages: CheckMessage[] = [];

  get ready(): boolean {
    return this._ready;
  }

  get status(): CheckStatus {
    return this._status;
  }

  get messages(): readonly CheckMessage[] {
    return this._messages;
  }

  setReady(ready: boolean): this {
    this._ready = this._ready && ready;
    return this;
  }

  setStatus(status: CheckStatus): this {
    if (compareStatus(status, this._status) > 0) {
      this._status = status;
    }
    return this;
  }

  addMessage(message: CheckMessage): this {
    this._messages.push(message);
    return this;
  }

  toJSON(): CheckVerdict {
    return {
      ready: this._ready,
      status: this._status,
      messages: [...this._messages],
    };
  }
}
