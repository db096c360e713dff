import { PushStatus, RingBuffer } from "./ringBuffer";
import type { RuntimeEmitContext, RuntimeEvent, RuntimeEventRecord, RuntimeHooks } from "./events";

export type EventHandler = (ev: RuntimeEventRecord) => void;

export type EventBusOptions = {
  /** capacidad de la cola de cada subscriber */
  capacity?: number;
  /** drenar en microtask (default) o sólo con flush() explícito */
  autoFlush?: boolean;
  onHandlerError?: (err: unknown, ev: RuntimeEventRecord) => void;
};

type Subscriber = {
  handler: EventHandler;
  // cola por subscriber (para aislar sinks lentos)
  q: RingBuffer<RuntimeEventRecord>;
  dropped: number;
};

const now = () => (typeof performance !== "undefined" ? performance.now() : Date.now());

export class EventBus implements RuntimeHooks {
  private seq = 1;
  private subs: Subscriber[] = [];
  private flushScheduled = false;
  private readonly capacity: number;
  private readonly autoFlush: boolean;
  private readonly onHandlerError: (err: unknown, ev: RuntimeEventRecord) => void;

  constructor(options: EventBusOptions = {}) {
    this.capacity = options.capacity ?? 2048;
    this.autoFlush = options.autoFlush ?? true;
    this.onHandlerError =
      options.onHandlerError ??
      ((err, ev) => console.error(`eventbus: handler failed on ${ev.type}#${ev.seq}`, err));
  }

  emit(ev: RuntimeEvent, ctx: RuntimeEmitContext) {
    const full: RuntimeEventRecord = {
      // los campos propios del evento ganan sobre el contexto
      ...ctx,
      ...ev,
      seq: this.seq++,
      ts: now(),
      wallTs: Date.now(),
    };

    for (const s of this.subs) {
      if (s.q.push(full) === PushStatus.Evicted) s.dropped++;
    }

    // drenar asap (microtask) sin bloquear emit
    if (this.autoFlush && !this.flushScheduled) {
      this.flushScheduled = true;
      queueMicrotask(() => this.flush());
    }
  }

  subscribe(handler: EventHandler) {
    this.subs.push({
      handler,
      q: new RingBuffer<RuntimeEventRecord>(this.capacity),
      dropped: 0,
    });

    return () => {
      this.subs = this.subs.filter((s) => s.handler !== handler);
    };
  }

  flush(budget = 4096) {
    this.flushScheduled = false;

    for (const s of this.subs) {
      let n = 0;

      if (s.dropped > 0) {
        // avisar el drop como evento "log"
        const dropEv: RuntimeEventRecord = {
          seq: 0,
          ts: now(),
          wallTs: Date.now(),
          type: "log",
          level: "warn",
          message: "eventbus.dropped",
          fields: { dropped: s.dropped },
        };
        s.dropped = 0;
        this.deliver(s, dropEv);
      }

      while (n++ < budget) {
        const ev = s.q.shift();
        if (!ev) break;
        this.deliver(s, ev);
      }
    }
  }

  private deliver(s: Subscriber, ev: RuntimeEventRecord) {
    try {
      s.handler(ev);
    } catch (err) {
      this.onHandlerError(err, ev);
    }
  }
}
