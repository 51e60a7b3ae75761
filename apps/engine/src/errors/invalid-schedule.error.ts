import { QuarryError } from '@quarry/sdk';

export class InvalidScheduleError extends QuarryError {
    constructor(public readonly schedule: string, detail: string) {
        super(`invalid schedule "${schedule}": ${detail}`);
    }
}
