// src/schema/validation.ts

import Ajv, {type ErrorObject} from 'ajv';

/** Shared validator instance; schemas use `nullable` rather than type unions. */
export const ajv = new Ajv({allErrors: true});

/**
 * Top-level property an error is about: the offending, unknown or missing
 * key. `undefined` when the error concerns the value as a whole.
 */
export function errorProperty(error: ErrorObject): string | undefined {
    if (error.keyword === 'additionalProperties' || error.keyword === 'required') {
        const name: unknown = error.params.additionalProperty ?? error.params.missingProperty;
        return typeof name === 'string' ? name : undefined;
    }
    const first = error.instancePath.split('/')[1];
    return first === undefined || first === '' ? undefined : first;
}
