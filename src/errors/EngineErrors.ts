/**
 * Error types raised at the edges of the engine.
 *
 * Board, RuleEngine and SearchEngine never throw: they report rejected moves,
 * terminal states and "no move" as return values. These errors are used where
 * a value cannot be returned, such as invalid configuration at startup or a
 * player adapter whose promise has to settle one way or the other.
 */

export enum EngineErrorCode {
    CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
    AI_NO_MOVE = 'AI_NO_MOVE',
    MOVE_REJECTED = 'MOVE_REJECTED',
    GAME_NOT_ACTIVE = 'GAME_NOT_ACTIVE'
}

export interface EngineErrorJSON {
    error: true;
    code: EngineErrorCode;
    message: string;
    context: Record<string, unknown>;
}

/**
 * Base class for engine errors
 */
export class EngineError extends Error {
    readonly code: EngineErrorCode;
    readonly context: Record<string, unknown>;

    constructor(code: EngineErrorCode, message: string, context: Record<string, unknown> = {}) {
        super(message);
        this.name = 'EngineError';
        this.code = code;
        this.context = context;

        Object.setPrototypeOf(this, new.target.prototype);
    }

    public toJSON(): EngineErrorJSON {
        return {
            error: true,
            code: this.code,
            message: this.message,
            context: this.context
        };
    }
}

export interface ConfigIssue {
    path: string;
    message: string;
}

/**
 * Environment configuration failed validation
 */
export class ConfigurationError extends EngineError {
    readonly issues: ConfigIssue[];

    constructor(issues: ConfigIssue[]) {
        const summary = issues.map(issue => `${issue.path || 'root'}: ${issue.message}`).join('; ');
        super(EngineErrorCode.CONFIGURATION_ERROR, `Invalid configuration: ${summary}`, { issues });
        this.name = 'ConfigurationError';
        this.issues = issues;
    }
}

/**
 * An AI player had no legal move to offer
 */
export class NoMoveError extends EngineError {
    constructor(context: Record<string, unknown> = {}) {
        super(EngineErrorCode.AI_NO_MOVE, 'No available moves', context);
        this.name = 'NoMoveError';
    }
}

export function isEngineError(error: unknown): error is EngineError {
    return error instanceof EngineError;
}
