import {EEventKind} from "./EEventKind";

/**
 * Allows events of one kind to run the pipeline when their branch matches one of the patterns.
 */
export interface ITriggerRule {
    readonly kind: EEventKind;

    /**
     * Exact branch names or globs. See `compileBranchPattern(..)` for the syntax.
     */
    readonly branches: ReadonlyArray<string>;
}
