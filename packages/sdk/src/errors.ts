import type { ValidationIssue } from './schema';

export class QuarryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

// --- construction time ---

export class InvalidDefinitionError extends QuarryError { }

export class DefinitionInUseError extends QuarryError {
    constructor(public readonly kind: 'task' | 'stage graph' | 'workflow', public readonly definitionName: string) {
        super(`${kind} "${definitionName}" is used by an in-flight run and cannot be replaced`);
    }
}

export class UnknownTaskError extends QuarryError {
    constructor(public readonly stageGraph: string, public readonly step: string, public readonly task: string) {
        super(`stage graph "${stageGraph}": step "${step}" uses unknown task "${task}"`);
    }
}

export class DuplicateStepError extends QuarryError {
    constructor(public readonly stageGraph: string, public readonly step: string) {
        super(`stage graph "${stageGraph}": step "${step}" is declared more than once`);
    }
}

export class UnknownDependencyError extends QuarryError {
    constructor(public readonly owner: string, public readonly step: string, public readonly dependency: string) {
        super(`"${owner}": step "${step}" refers to unknown step "${dependency}"`);
    }
}

export class StageOrderingViolation extends QuarryError {
    constructor(public readonly stageGraph: string, public readonly step: string, detail: string) {
        super(`stage graph "${stageGraph}": step "${step}" ${detail}`);
    }
}

export class CyclicDependencyError extends QuarryError {
    constructor(public readonly stageGraph: string, public readonly cycle: readonly string[]) {
        super(`stage graph "${stageGraph}": cycle detected: ${cycle.join(' -> ')}`);
    }
}

export class UnknownStageGraphError extends QuarryError {
    constructor(public readonly workflow: string, public readonly stageGraph: string) {
        super(`workflow "${workflow}" uses unknown stage graph "${stageGraph}"`);
    }
}

export class DuplicateStageGraphError extends QuarryError {
    constructor(public readonly workflow: string, public readonly stageGraph: string) {
        super(`workflow "${workflow}" lists stage graph "${stageGraph}" more than once`);
    }
}

export class WorkflowOrderingViolation extends QuarryError {
    constructor(public readonly workflow: string, public readonly stageGraph: string, detail: string) {
        super(`workflow "${workflow}": stage graph "${stageGraph}" ${detail}`);
    }
}

// --- resolution / execution time, captured per step ---

export class UnresolvedReferenceError extends QuarryError {
    constructor(public readonly step: string, public readonly parameter: string, detail: string) {
        super(`step "${step}", parameter "${parameter}": ${detail}`);
    }
}

export class ParameterValidationError extends QuarryError {
    constructor(
        public readonly step: string,
        public readonly parameter: string,
        public readonly issues: readonly ValidationIssue[],
    ) {
        const first = issues[0];
        const where = first && first.path.length > 0 ? first.path.join('.') : parameter;
        super(
            first
                ? `step "${step}", parameter "${where}": expected ${first.expected}, got ${first.actual}`
                : `step "${step}", parameter "${parameter}": invalid value`,
        );
    }
}

export class OutputValidationError extends QuarryError {
    constructor(public readonly step: string, public readonly issues: readonly ValidationIssue[]) {
        super(
            `step "${step}" produced invalid output: ` +
            issues.map(i => `${i.path.join('.') || '<root>'}: expected ${i.expected}, got ${i.actual}`).join('; '),
        );
    }
}

// --- pass level ---

export class UnknownWorkflowError extends QuarryError {
    constructor(public readonly workflow: string) {
        super(`workflow "${workflow}" is not registered`);
    }
}
