/**
 * One-time initialization cell.
 *
 * The returned accessor runs `init` on its first call and hands back the same
 * value on every later call. A value is stored only once `init` returns, so a
 * throwing initializer leaves the cell empty and the next call retries.
 */
export function lazy<T>(init: () => T): () => T {
    let state: { done: true; value: T } | { done: false; running: boolean } = {
        done: false,
        running: false,
    };

    return () => {
        if (state.done) return state.value;
        if (state.running) {
            throw new Error("lazy: initializer re-entered its own accessor");
        }

        state = { done: false, running: true };
        try {
            const value = init();
            state = { done: true, value };
            return value;
        } finally {
            if (!state.done) state = { done: false, running: false };
        }
    };
}
