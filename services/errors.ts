export type ClearanceErrorCode = 'VALIDATION' | 'OUT_OF_RANGE' | 'DATA_INTEGRITY';

export class ClearanceError extends Error {
    readonly code: ClearanceErrorCode;

    constructor(code: ClearanceErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Malformed or out-of-domain input. */
export class ValidationError extends ClearanceError {
    readonly field: string;

    constructor(field: string, message: string) {
        super('VALIDATION', message);
        this.field = field;
    }
}

/** Query height outside the span the boundary defines. */
export class OutOfRangeError extends ClearanceError {
    readonly heightMm: number;
    readonly span: readonly [number, number];

    constructor(heightMm: number, span: readonly [number, number]) {
        super(
            'OUT_OF_RANGE',
            `Height ${heightMm} mm is outside the envelope span ${span[0].toFixed(1)}..${span[1].toFixed(1)} mm`
        );
        this.heightMm = heightMm;
        this.span = span;
    }
}

/** Envelope table that breaks the shape the engine relies on. */
export class DataIntegrityError extends ClearanceError {
    readonly index: number;

    constructor(index: number, message: string) {
        super('DATA_INTEGRITY', message);
        this.index = index;
    }
}
