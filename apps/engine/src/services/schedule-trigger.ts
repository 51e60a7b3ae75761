import { nextOccurrence, ScheduleSpec, validateSchedule } from '../utils/schedule';

const TAG = '[scheduler]';

// setTimeout overflows past this and fires immediately.
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface TriggerHandle {
    stop(): void;
}

export interface ScheduleTrigger {
    schedule(spec: ScheduleSpec, callback: (firedAt: Date) => void): TriggerHandle;
}

/**
 * Timer-backed trigger. The next occurrence is armed before the callback runs,
 * so a slow or throwing callback never delays the schedule.
 */
export class TimerTrigger implements ScheduleTrigger {
    constructor(private readonly now: () => Date = () => new Date()) { }

    schedule(spec: ScheduleSpec, callback: (firedAt: Date) => void): TriggerHandle {
        validateSchedule(spec);

        let stopped = false;
        let timer: NodeJS.Timeout | null = null;
        let due = nextOccurrence(spec, this.now());

        const arm = () => {
            if (stopped) return;
            const delay = Math.max(0, due.getTime() - this.now().getTime());
            timer = setTimeout(tick, Math.min(delay, MAX_TIMER_DELAY_MS));
        };

        const tick = () => {
            if (stopped) return;
            const now = this.now();
            if (now.getTime() < due.getTime()) {
                arm();
                return;
            }

            const firedAt = due;
            try {
                due = nextOccurrence(spec, now);
            } catch (err) {
                console.error(`${TAG} no further occurrence, schedule stopped:`, err);
                stopped = true;
            }
            arm();

            try {
                callback(firedAt);
            } catch (err) {
                console.error(`${TAG} callback error:`, err);
            }
        };

        arm();

        return {
            stop: () => {
                stopped = true;
                if (timer) {
                    clearTimeout(timer);
                    timer = null;
                }
            },
        };
    }
}
