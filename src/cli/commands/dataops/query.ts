/**
 * sf dataops query
 *
 * Export the results of a SOQL query to a CSV file, following every page.
 */

import { Flags, SfCommand } from '@salesforce/sf-plugins-core';
import { Args } from '@oclif/core';
import { Messages } from '@salesforce/core';
import { createDataOpsService } from '../../../core/api-service.js';
import { loadConfig } from '../../../config/dataops-config.js';
import { ScriptedDecisionProvider } from '../../../services/decisions.js';
import { describeError } from '../../utils/format.js';

Messages.importMessagesDirectoryFromMetaUrl(import.meta.url);
const messages = Messages.loadMessages('sf-dataops', 'dataops.query');

export interface QueryExportResult {
  rows: number;
  outputPath: string;
}

export default class Query extends SfCommand<QueryExportResult> {
  public static readonly summary = messages.getMessage('summary');
  public static readonly description = messages.getMessage('description');
  public static readonly examples = messages.getMessages('examples');

  public static readonly args = {
    soql: Args.string({
      description: messages.getMessage('args.soql.description'),
      required: true,
    }),
    output: Args.string({
      description: messages.getMessage('args.output.description'),
      required: true,
    }),
  };

  public static readonly flags = {
    'target-org': Flags.requiredOrg({
      char: 'o',
      summary: messages.getMessage('flags.target-org.summary'),
      required: true,
    }),
    config: Flags.file({
      char: 'c',
      summary: messages.getMessage('flags.config.summary'),
      exists: true,
    }),
  };

  public async run(): Promise<QueryExportResult> {
    const { args, flags } = await this.parse(Query);

    try {
      const config = loadConfig(flags.config);
      const service = createDataOpsService({
        org: flags['target-org'],
        config,
        decisions: new ScriptedDecisionProvider(),
      });

      this.spinner.start('Querying');
      const rows = await service.queryExport(args.soql, args.output);
      this.spinner.stop();

      this.log(messages.getMessage('info.written', [rows, args.output]));
      return { rows, outputPath: args.output };
    } catch (error) {
      this.spinner.stop('failed');
      this.error(describeError(error));
    }
  }
}
