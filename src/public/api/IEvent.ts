import {EEventKind} from "./EEventKind";

/**
 * The incoming event that may trigger a pipeline run.
 */
export interface IEvent {
    readonly kind: EEventKind;

    /**
     * The branch the push went to, or the target branch of the pull request.
     */
    readonly branch: string;
}
