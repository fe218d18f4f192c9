import { InvariantViolationError } from '../common/errors.js';

/** Parsed form of `queryId.stageId.stageExecutionId.id.attemptNumber` */
export interface TaskId {
	readonly queryId: string;
	readonly stageId: number;
	readonly stageExecutionId: number;
	readonly id: number;
	readonly attemptNumber: number;
}

function parseComponent(text: string, part: string, taskId: string): number {
	if (!/^\d+$/.test(part)) {
		throw new InvariantViolationError(`Malformed task id '${taskId}': ${text} '${part}' is not a number`, taskId);
	}
	return Number.parseInt(part, 10);
}

export function parseTaskId(taskId: string): TaskId {
	const parts = taskId.split('.');
	if (parts.length !== 5) {
		throw new InvariantViolationError(`Malformed task id '${taskId}': expected 5 dot-separated parts, got ${parts.length}`, taskId);
	}
	const [queryId, stageId, stageExecutionId, id, attemptNumber] = parts;
	return {
		queryId,
		stageId: parseComponent('stage id', stageId, taskId),
		stageExecutionId: parseComponent('stage execution id', stageExecutionId, taskId),
		id: parseComponent('task number', id, taskId),
		attemptNumber: parseComponent('attempt number', attemptNumber, taskId),
	};
}

/**
 * Identifies a task among all tasks running the same stage:
 * the low 10 bits of the stage id, then the low 14 bits of the task number.
 */
export function taskUniqueId(taskId: TaskId): number {
	return ((taskId.stageId & 0x3ff) << 14) | (taskId.id & 0x3fff);
}
