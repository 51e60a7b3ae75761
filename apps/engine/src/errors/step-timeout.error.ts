import { QuarryError } from '@quarry/sdk';

export class StepTimeoutError extends QuarryError {
    constructor(public readonly step: string, public readonly timeoutMs: number) {
        super(`step "${step}" timed out after ${timeoutMs}ms`);
    }
}
