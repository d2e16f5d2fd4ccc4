import { parse as yamlParse } from 'yaml';

import { rootLogger } from './logging.js';
import { Result, failure, success } from './result.js';

export function tryParseJsonOrYaml(input: string): Result<unknown> {
  try {
    if (input.trimStart().startsWith('{')) {
      return success(JSON.parse(input));
    } else {
      return success(yamlParse(input));
    }
  } catch (error) {
    rootLogger.debug({ error }, 'Error parsing JSON or YAML');
    return failure('Input is not valid JSON or YAML');
  }
}
