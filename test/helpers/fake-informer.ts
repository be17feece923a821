import { EventEmitter } from "node:events";
import type { ResourceInformer } from "../../src/controllers/podset-controller/controller-types.js";

type Verb = "add" | "update" | "delete";

// Informer driven by hand: emit() and fail() play the role of the watch
export class FakeInformer<T> implements ResourceInformer<T> {
  starts = 0;
  stops = 0;

  private events = new EventEmitter();

  on(verb: Verb, cb: (obj: T) => void): void;
  on(verb: "error", cb: (err: unknown) => void): void;
  on(verb: Verb | "error", cb: ((obj: T) => void) | ((err: unknown) => void)): void {
    this.events.on(verb, cb);
  }

  async start() {
    this.starts++;
  }

  async stop() {
    this.stops++;
  }

  emit(verb: Verb, obj: T) {
    this.events.emit(verb, obj);
  }

  fail(err: unknown) {
    this.events.emit("error", err);
  }

  listenerCount(verb: Verb | "error"): number {
    return this.events.listenerCount(verb);
  }
}
