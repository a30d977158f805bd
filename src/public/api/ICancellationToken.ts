/**
 * Lets running jobs observe an external cancel request.
 */
export interface ICancellationToken {
    isCancellationRequested(): boolean;

    /**
     * Registers a listener that is called once when cancellation is requested. If cancellation was already requested,
     * the listener is called right away. Returns a function that unregisters the listener.
     */
    onCancellationRequested(listener: () => void): () => void;
}
