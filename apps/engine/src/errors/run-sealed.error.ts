import { QuarryError } from '@quarry/sdk';

export class RunSealedError extends QuarryError {
    constructor(public readonly runId: string) {
        super(`run ${runId} is sealed; no further outcomes can be recorded`);
    }
}
