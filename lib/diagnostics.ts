export type {
    PropertySnapshot, ViewModelSnapshot, DiagnosticsOptions
};
export {
    DiagnosticsCollector
};

import {dispatch} from "./async-state.js";
import {AsyncCell} from "./async-cell.js";
import {Cell, ValueCell} from "./cell.js";
import {ListCell} from "./list.js";
import {MapCell} from "./map.js";
import type {Notifier} from "./notifier.js";
import {truncate} from "./prelude.js";
import {SelectedCell} from "./select.js";
import {SetCell} from "./set.js";
import {StreamCell} from "./stream.js";
import {TaskCell} from "./task.js";
import type {ViewModel} from "./view-model.js";

interface PropertySnapshot {
    readonly name: string;
    /** Kind of cell, e.g. "TaskCell". */
    readonly type: string;
    /** Short description of the current value, e.g. "List (3 items)". */
    readonly value: string;
    /** Untruncated description (only from {@link DiagnosticsCollector.inspect}). */
    readonly description?: string;
}

interface ViewModelSnapshot {
    readonly id: number;
    readonly type: string;
    readonly disposed: boolean;
    readonly properties: readonly PropertySnapshot[];
}

interface DiagnosticsOptions {
    /** Maximum length of value descriptions in snapshots (default 50). */
    maxLength?: number;
}

function errorText(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** Read-only inspection of live view-models for debugging tools. View-models are held weakly, so
    registering one does not keep it alive; collected ones drop out of snapshots.
    
    Nothing registers itself: create a collector and register the view-models to watch. */
class DiagnosticsCollector {
    private readonly viewModels = new Map<number, WeakRef<ViewModel>>();
    private nextId = 0;
    private readonly maxLength: number;
    
    constructor({maxLength = 50}: DiagnosticsOptions = {}) {
        this.maxLength = maxLength;
    }
    
    /** Start watching viewModel. Returns its id in snapshots. */
    register(viewModel: ViewModel): number {
        const id = this.nextId++;
        this.viewModels.set(id, new WeakRef(viewModel));
        
        return id;
    }
    
    unregister(id: number) {
        this.viewModels.delete(id);
    }
    
    /** Snapshots of all live registered view-models, in order of registration. */
    snapshot(): ViewModelSnapshot[] {
        const snapshots: ViewModelSnapshot[] = [];
        
        for (const [id, ref] of this.viewModels) {
            const viewModel = ref.deref();
            if (viewModel === undefined) {
                this.viewModels.delete(id);
            } else {
                snapshots.push(this.snapshotOf(id, viewModel, false));
            }
        }
        
        return snapshots;
    }
    
    /** A detailed snapshot of the view-model with id, or undefined if it is not (or no longer)
        there. */
    inspect(id: number): ViewModelSnapshot | undefined {
        const viewModel = this.viewModels.get(id)?.deref();
        if (viewModel === undefined) { return undefined; }
        
        return this.snapshotOf(id, viewModel, true);
    }
    
    /** Kind of cell. */
    typeName(cell: Notifier): string {
        if (cell instanceof ValueCell) { return "ValueCell"; }
        if (cell instanceof TaskCell) { return "TaskCell"; }
        if (cell instanceof StreamCell) { return "StreamCell"; }
        if (cell instanceof ListCell) { return "ListCell"; }
        if (cell instanceof MapCell) { return "MapCell"; }
        if (cell instanceof SetCell) { return "SetCell"; }
        if (cell instanceof SelectedCell) { return "SelectedCell"; }
        
        return cell.constructor.name;
    }
    
    /** Describe the current value of cell in at most `maxLength` characters (plus ellipses). */
    describe(cell: Notifier): string { return this.description(cell, this.maxLength); }
    
    private description(cell: Notifier, maxLength: number): string {
        if (cell instanceof AsyncCell) {
            return dispatch(cell.state, {
                idle: () => "Idle",
                loading: () => "Loading...",
                data: (d) => `Data: ${truncate(String(d), maxLength)}`,
                error: (e) => `Error: ${truncate(errorText(e), maxLength)}`,
                completed: (d) =>
                    d === undefined ? "Done" : `Done: ${truncate(String(d), maxLength)}`
            });
        }
        if (cell instanceof ListCell) { return `List (${cell.length} items)`; }
        if (cell instanceof MapCell) { return `Map (${cell.size} entries)`; }
        if (cell instanceof SetCell) { return `Set (${cell.size} items)`; }
        if (cell instanceof Cell || cell instanceof SelectedCell) {
            return truncate(String(cell.value), maxLength);
        }
        
        return "";
    }
    
    private snapshotOf(id: number, viewModel: ViewModel, detailed: boolean): ViewModelSnapshot {
        const properties: PropertySnapshot[] = [];
        
        for (const [name, cell] of viewModel.properties) {
            const property = {
                name,
                type: this.typeName(cell),
                value: this.describe(cell)
            };
            properties.push(detailed
                ? {...property, description: this.description(cell, Infinity)}
                : property);
        }
        
        return {
            id,
            type: viewModel.constructor.name,
            disposed: viewModel.isDisposed,
            properties
        };
    }
}
