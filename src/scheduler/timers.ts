export interface TimerHandle {
    cancel(): void
}

export interface TimerFactory {
    schedule(delayMs: number, fn: () => void): TimerHandle
}

/** Largest delay `setTimeout` honours; anything above it fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647

export const systemTimers: TimerFactory = {
    schedule(delayMs, fn) {
        let timer: ReturnType<typeof setTimeout>
        const deadline = Date.now() + delayMs
        const arm = (remaining: number) => {
            timer = setTimeout(() => {
                const left = deadline - Date.now()
                if (left > 0) arm(left)
                else fn()
            }, Math.min(remaining, MAX_TIMER_DELAY_MS))
        }
        arm(delayMs)
        return { cancel: () => clearTimeout(timer) }
    },
}
