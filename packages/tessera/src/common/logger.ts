import debug from 'debug';

const ROOT_NAMESPACE = 'tessera';

/**
 * Subsystems that log. A component logs under `tessera:<area>:<component>`,
 * so `DEBUG=tessera:lowering*` traces plan lowering without the filter compiler.
 */
export type LogArea = 'lowering' | 'filter' | 'config';

function namespaceOf(area: LogArea, component?: string): string {
	return component === undefined ? `${ROOT_NAMESPACE}:${area}` : `${ROOT_NAMESPACE}:${area}:${component}`;
}

/**
 * Logger for a component of an area.
 *
 * ```typescript
 * const log = createLogger('lowering', 'rewrite:semi-join');  // tessera:lowering:rewrite:semi-join
 * log('No semi join match at %s', node.id);
 * ```
 */
export function createLogger(area: LogArea, component?: string): debug.Debugger {
	return debug(namespaceOf(area, component));
}

/**
 * Turns logging on, either for whole areas or for a raw debug pattern such as
 * `tessera:*,-tessera:filter*`. Everything is enabled by default.
 * @param logFn Replaces the debug library's stderr writer
 */
export function enableLogging(
	selection: string | readonly LogArea[] = `${ROOT_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void,
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(typeof selection === 'string'
		? selection
		: selection.map(area => `${namespaceOf(area)}*`).join(','));
}

export function disableLogging(): void {
	debug.disable();
}

/** Lets callers skip building expensive log arguments */
export function isLoggingEnabled(area: LogArea, component?: string): boolean {
	return debug.enabled(namespaceOf(area, component));
}
