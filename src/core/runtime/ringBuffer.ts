// ringBuffer.ts
export const PushStatus = {
    Ok: 0,
    // se descartó el elemento más viejo para hacer lugar
    Evicted: 1 << 0,
} as const;

export type PushStatus = (typeof PushStatus)[keyof typeof PushStatus];

/**
 * Buffer circular de capacidad fija (potencia de 2).
 * Cuando está lleno, `push` pisa el elemento más viejo ("sliding").
 */
export class RingBuffer<T> {
    private readonly buf: (T | undefined)[];
    private readonly mask: number;
    private head = 0;
    private size_ = 0;

    constructor(capacity: number = 1024) {
        const cap = nextPow2(Math.max(2, capacity));
        this.buf = new Array<T | undefined>(cap);
        this.mask = cap - 1;
    }

    get length(): number { return this.size_; }
    get capacity(): number { return this.buf.length; }
    isEmpty(): boolean { return this.size_ === 0; }

    push(value: T): PushStatus {
        if (this.size_ === this.buf.length) {
            this.buf[this.head] = value;
            this.head = (this.head + 1) & this.mask;
            return PushStatus.Evicted;
        }

        this.buf[(this.head + this.size_) & this.mask] = value;
        this.size_++;
        return PushStatus.Ok;
    }

    shift(): T | undefined {
        if (this.size_ === 0) return undefined;
        const value = this.buf[this.head];
        this.buf[this.head] = undefined;
        this.head = (this.head + 1) & this.mask;
        this.size_--;
        return value;
    }

    /** copia en orden de inserción (más viejo primero) */
    toArray(): T[] {
        const out: T[] = [];
        for (let i = 0; i < this.size_; i++) {
            const v = this.buf[(this.head + i) & this.mask];
            if (v !== undefined) out.push(v);
        }
        return out;
    }

    clear(): void {
        this.buf.fill(undefined);
        this.head = 0;
        this.size_ = 0;
    }
}

function nextPow2(n: number): number {
    let x = 1;
    while (x < n) x <<= 1;
    return x;
}
