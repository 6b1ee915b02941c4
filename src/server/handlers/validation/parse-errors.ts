/**
 * Parser errors reported by the format libraries.
 */

import { DocParseError } from '../../../parser';
import { Finding } from '../../types';

export function checkParseErrors(errors: readonly DocParseError[]): Finding[] {
    return errors.map((error): Finding => ({
        range: error.range,
        severity: 'information',
        message: `Parse error: ${error.message}`,
        code: 'parse-error',
    }));
}
