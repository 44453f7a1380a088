import { Command } from 'commander';
import { loadOpenApiDocument } from '../openapi.js';
import * as out from '../output.js';
import { withErrorHandling } from '../helpers.js';

export function createOpenApiCommand(): Command {
  return new Command('openapi')
    .description('Print the OpenAPI document as JSON')
    .action(withErrorHandling(() => {
      out.info(JSON.stringify(loadOpenApiDocument(), null, 2));
    }));
}
