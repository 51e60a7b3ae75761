import type { ScheduleTrigger, TriggerHandle } from '../../src/services/schedule-trigger';
import type { ScheduleSpec } from '../../src/utils/schedule';

interface Registration {
    spec: ScheduleSpec;
    callback: (firedAt: Date) => void;
    stopped: boolean;
}

// Fires occurrences on demand instead of on a clock.
export class ManualTrigger implements ScheduleTrigger {
    readonly registrations: Registration[] = [];

    schedule(spec: ScheduleSpec, callback: (firedAt: Date) => void): TriggerHandle {
        const registration: Registration = { spec, callback, stopped: false };
        this.registrations.push(registration);
        return {
            stop: () => {
                registration.stopped = true;
            },
        };
    }

    fire(at: Date = new Date()): number {
        const live = this.registrations.filter(r => !r.stopped);
        live.forEach(r => r.callback(at));
        return live.length;
    }
}
