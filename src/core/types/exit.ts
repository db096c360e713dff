/** Un throw dentro de un scope: no sabemos su tipo, así que siempre es un Die. */
export type Cause = { readonly _tag: "Die"; readonly defect: unknown };

/** Cómo terminó un scope: lo reciben todos los finalizers. */
export type Exit<A> =
    | { readonly _tag: "Success"; readonly value: A }
    | { readonly _tag: "Failure"; readonly cause: Cause };

export const Exit = {
    succeed: <A>(value: A): Exit<A> => ({
        _tag: "Success",
        value,
    }),

    fromThrown: <A = never>(err: unknown): Exit<A> => ({
        _tag: "Failure",
        cause: { _tag: "Die", defect: err },
    }),

    unit: (): Exit<void> => ({ _tag: "Success", value: undefined }),
};

export function exitStatus(exit: Exit<unknown>): "success" | "failure" {
    return exit._tag === "Success" ? "success" : "failure";
}
