import type { EndpointName } from "@clia/shared";

export type EndpointState =
  | { kind: "idle" }
  | { kind: "activating" }
  | { kind: "ready" }
  | { kind: "handling"; inFlight: number };

export type TransitionListener = (endpoint: EndpointName, from: EndpointState, to: EndpointState) => void;

/**
 * idle -> activating -> ready -> handling(n) -> ready | idle.
 * Moves that do not fit the current state throw; they mean the dispatcher
 * lost track of a call.
 */
export class EndpointLifecycle {
  private current: EndpointState = { kind: "idle" };
  private listeners: TransitionListener[] = [];

  constructor(readonly endpoint: EndpointName) {}

  get state(): EndpointState {
    return this.current;
  }

  get inFlight(): number {
    return this.current.kind === "handling" ? this.current.inFlight : 0;
  }

  onTransition(listener: TransitionListener): void {
    this.listeners.push(listener);
  }

  /** Returns true when this call started the activation. */
  beginActivation(): boolean {
    if (this.current.kind !== "idle") return false;
    this.move({ kind: "activating" });
    return true;
  }

  activated(): void {
    if (this.current.kind === "activating") this.move({ kind: "ready" });
  }

  activationFailed(): void {
    if (this.current.kind === "activating") this.move({ kind: "idle" });
  }

  enter(): void {
    switch (this.current.kind) {
      case "ready":
        this.move({ kind: "handling", inFlight: 1 });
        return;
      case "handling":
        this.move({ kind: "handling", inFlight: this.current.inFlight + 1 });
        return;
      default:
        throw new Error(`${this.endpoint} endpoint cannot handle calls while ${this.current.kind}`);
    }
  }

  leave(): void {
    if (this.current.kind !== "handling") {
      throw new Error(`${this.endpoint} endpoint has no call in flight`);
    }
    const remaining = this.current.inFlight - 1;
    this.move(remaining > 0 ? { kind: "handling", inFlight: remaining } : { kind: "ready" });
  }

  /** Inactivity teardown; only a ready endpoint can go idle. */
  deactivate(): void {
    if (this.current.kind === "ready") this.move({ kind: "idle" });
  }

  private move(next: EndpointState): void {
    const previous = this.current;
    this.current = next;
    for (const listener of this.listeners) listener(this.endpoint, previous, next);
  }
}
