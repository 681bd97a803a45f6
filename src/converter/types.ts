/**
 * STL Relay: Converter Contract
 */

import type { ConversionRequest } from '../shared/types.js';

/**
 * Turns a decoded request into an STL file.
 * Resolves with the path of the written file.
 */
export interface Converter {
  convert(request: ConversionRequest): Promise<string>;
}
