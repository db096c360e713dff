import { nullableKind } from "../core/ownership/resourceKind";
import { UniqueOwner } from "../core/ownership/uniqueOwner";
import type { OwnershipRuntime } from "../core/runtime/runtime";
import type { Releasable } from "../core/runtime/scope";

export type GraphicsObjectType = "font" | "pen" | "brush" | "bitmap" | "region";

/** Recurso de dibujo (handle opaco del subsistema gráfico). */
export interface GraphicsObject {
    readonly objectType: GraphicsObjectType;
}

export interface Font extends GraphicsObject {
    readonly objectType: "font";
}

export interface Pen extends GraphicsObject {
    readonly objectType: "pen";
}

export interface Brush extends GraphicsObject {
    readonly objectType: "brush";
}

export interface DeviceContext {
    readonly contextId: number;
}

export interface GraphicsApi {
    deleteObject(object: GraphicsObject): void;
    deleteContext(context: DeviceContext): void;
    /** devuelve el objeto que estaba seleccionado (null si falló) */
    select(context: DeviceContext, object: GraphicsObject): GraphicsObject | null;
}

export class GraphicsObjectOwner<T extends GraphicsObject> extends UniqueOwner<T | null> {
    constructor(graphics: GraphicsApi, object: T | null = null, runtime?: OwnershipRuntime) {
        super(
            nullableKind<T>("graphics-object", (o) => graphics.deleteObject(o)),
            object,
            runtime
        );
    }
}

export class FontOwner extends GraphicsObjectOwner<Font> {}
export class PenOwner extends GraphicsObjectOwner<Pen> {}
export class BrushOwner extends GraphicsObjectOwner<Brush> {}

export class DeviceContextOwner extends UniqueOwner<DeviceContext | null> {
    constructor(graphics: GraphicsApi, context: DeviceContext | null = null, runtime?: OwnershipRuntime) {
        super(
            nullableKind<DeviceContext>("device-context", (dc) => graphics.deleteContext(dc)),
            context,
            runtime
        );
    }
}

type Selection = {
    readonly context: DeviceContext;
    readonly previous: GraphicsObject;
};

/**
 * Selecciona `object` en `context` y, en `dispose`, vuelve a seleccionar el
 * anterior. Guards anidados sobre el mismo contexto restauran en LIFO.
 */
export class DeviceContextSelectionGuard implements Releasable {
    private readonly selection: UniqueOwner<Selection | null>;

    constructor(graphics: GraphicsApi, context: DeviceContext, object: GraphicsObject, runtime?: OwnershipRuntime) {
        const previous = graphics.select(context, object);
        // si la selección falló no hay nada que restaurar
        this.selection = new UniqueOwner(
            nullableKind<Selection>("dc-selection", (s) => {
                graphics.select(s.context, s.previous);
            }),
            previous === null ? null : { context, previous },
            runtime
        );
    }

    get ownerId(): number {
        return this.selection.ownerId;
    }

    /** Lo que había seleccionado antes de este guard. */
    previous(): GraphicsObject | null {
        return this.selection.get()?.previous ?? null;
    }

    dispose(): void {
        this.selection.dispose();
    }
}
