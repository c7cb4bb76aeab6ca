import {
  BoundaryNotFoundError,
  FormatError,
  NoCaptionsError,
  SchemaError,
  formatCueLines,
} from '../../core/index.js';

export const EXIT_CODES = {
  format: 2,
  noCaptions: 3,
  schema: 4,
  boundary: 5,
  unexpected: 99,
} as const;

export function exitCodeFor(error: unknown): number {
  if (error instanceof FormatError) return EXIT_CODES.format;
  if (error instanceof NoCaptionsError) return EXIT_CODES.noCaptions;
  if (error instanceof SchemaError) return EXIT_CODES.schema;
  if (error instanceof BoundaryNotFoundError) return EXIT_CODES.boundary;
  return EXIT_CODES.unexpected;
}

/**
 * Print an error with whatever input caused it, then exit with the code for
 * its class.
 */
export function reportError(error: unknown, verbose = false): never {
  if (error instanceof Error) {
    console.error(`❌ Error: ${error.message}`);

    if (error instanceof SchemaError) {
      console.error('\n🔍 Respuesta cruda del modelo:');
      console.error(error.rawResponse || '(vacía)');
    } else if (error instanceof BoundaryNotFoundError && error.cues.length > 0) {
      console.error('\n🔍 CUEs revisados:');
      console.error(formatCueLines([...error.cues]));
    }

    if (verbose && error.stack) {
      console.error(`📋 Stack trace:\n${error.stack}`);
    }
    if (error.cause) {
      console.error(`🔗 Cause: ${String(error.cause)}`);
    }
  } else {
    console.error('❌ Error:', error);
  }

  process.exit(exitCodeFor(error));
}
