import { TSchema } from '@sinclair/typebox';
import { AssertError } from '@sinclair/typebox/value';

function extractDescription(schema: TSchema | undefined): string | undefined {
  if (!schema) return undefined;
  if (typeof schema.description === 'string') return schema.description;

  const variants: unknown = schema.anyOf;
  if (Array.isArray(variants)) {
    for (const variant of variants) {
      if (
        variant &&
        typeof variant === 'object' &&
        'description' in variant &&
        typeof variant.description === 'string'
      ) {
        return variant.description;
      }
    }
  }
  return undefined;
}

function getSchemaHint(path: string): string {
  if (path.includes('port')) {
    return 'Tip: port should be a number between 1 and 65535';
  }
  if (path.startsWith('/sources')) {
    return 'Tip: sources.<name>.retryStatuses is a list of HTTP statuses, delays and timeouts are milliseconds';
  }
  if (path.startsWith('/scheduler')) {
    return 'Tip: scheduler.intervalMs is at least 1000 milliseconds';
  }
  if (path.startsWith('/storage')) {
    return 'Tip: storage.driver should be one of: memory, sqlite';
  }
  if (path.startsWith('/logger')) {
    return 'Tip: logger.level should be one of: error, warn, info, debug, verbose';
  }

  return '';
}

function handleSchemaValidationError(error: AssertError, context: string): never {
  const errorDetails = error.error;

  if (!errorDetails) {
    throw new Error(
      [
        context,
        'YAML configuration validation failed.',
        'Please verify your YAML configuration structure.',
        'See config.example.yaml for reference.',
      ].join('\n'),
      { cause: error },
    );
  }

  const fieldName = errorDetails.path
    ? errorDetails.path.slice(1).replace(/\//g, '.')
    : 'unknown';
  const valueDisplay =
    errorDetails.value !== undefined
      ? ` (received: ${JSON.stringify(errorDetails.value)})`
      : '';
  const fieldDescription = extractDescription(errorDetails.schema);

  const message = [
    `YAML configuration validation failed: ${fieldName}`,
    `Expected: ${errorDetails.message}${valueDisplay}`,
    fieldDescription ? `Description: ${fieldDescription}` : '',
    getSchemaHint(errorDetails.path),
    'See config.example.yaml for reference.',
  ]
    .filter(Boolean)
    .join('\n');

  throw new Error(message, { cause: error });
}

export function handleValidationError(error: unknown, context: string): never {
  if (error instanceof AssertError) {
    handleSchemaValidationError(error, context);
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  throw new Error(`${context}\nError: ${errorMessage}`, { cause: error });
}
