export type ConnectionState =
  | "idle"
  | "reading-head"
  | "awaiting-body"
  | "writing-response"
  | "keep-alive-wait"
  | "upgraded"
  | "closing"
  | "closed";

const NON_TERMINAL_EXITS = ["upgraded", "closing"] as const;

/** Allowed moves; anything else is a bug in the driver */
export const TRANSITIONS: Readonly<Record<ConnectionState, readonly ConnectionState[]>> = {
  idle: ["reading-head", ...NON_TERMINAL_EXITS],
  "reading-head": ["awaiting-body", "writing-response", ...NON_TERMINAL_EXITS],
  "awaiting-body": ["writing-response", ...NON_TERMINAL_EXITS],
  "writing-response": ["awaiting-body", "reading-head", "keep-alive-wait", ...NON_TERMINAL_EXITS],
  "keep-alive-wait": ["reading-head", ...NON_TERMINAL_EXITS],
  upgraded: ["closing"],
  closing: ["closed"],
  closed: [],
};

export class IllegalTransitionError extends Error {
  readonly from: ConnectionState;
  readonly to: ConnectionState;

  constructor(from: ConnectionState, to: ConnectionState) {
    super(`illegal connection transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
    this.from = from;
    this.to = to;
  }
}

export type TransitionListener = (from: ConnectionState, to: ConnectionState) => void;

export class ConnectionStateMachine {
  private current: ConnectionState;
  private readonly listeners: TransitionListener[] = [];

  constructor(initial: ConnectionState = "idle") {
    this.current = initial;
  }

  get state(): ConnectionState {
    return this.current;
  }

  get terminal(): boolean {
    return this.current === "closed";
  }

  /** whether the connection still frames HTTP messages */
  get speaksHttp(): boolean {
    return this.current !== "upgraded" && this.current !== "closing" && this.current !== "closed";
  }

  can(to: ConnectionState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: ConnectionState) {
    const from = this.current;
    if (!this.can(to)) {
      throw new IllegalTransitionError(from, to);
    }
    this.current = to;
    for (const listener of this.listeners) listener(from, to);
  }

  /** Transition when allowed and not already there; returns whether it moved */
  tryTransition(to: ConnectionState): boolean {
    if (this.current === to || !this.can(to)) return false;
    this.transition(to);
    return true;
  }

  onTransition(listener: TransitionListener) {
    this.listeners.push(listener);
  }
}
