/**
 * sf dataops upload
 *
 * Upload a CSV file to an object with insert, update, upsert or delete.
 */

import { Flags, SfCommand } from '@salesforce/sf-plugins-core';
import { Args } from '@oclif/core';
import { Messages } from '@salesforce/core';
import { createDataOpsService } from '../../../core/api-service.js';
import { OPERATIONS, type DecisionProvider, type SyncSummary } from '../../../core/types.js';
import { loadConfig } from '../../../config/dataops-config.js';
import { PromptDecisionProvider, ScriptedDecisionProvider } from '../../../services/decisions.js';
import { DispatchReporter } from '../../utils/dispatch-reporter.js';
import { describeError, formatSyncSummary } from '../../utils/format.js';
import { parseMappingFlag } from '../../utils/mapping-flag.js';

Messages.importMessagesDirectoryFromMetaUrl(import.meta.url);
const messages = Messages.loadMessages('sf-dataops', 'dataops.upload');

export default class Upload extends SfCommand<SyncSummary> {
  public static readonly summary = messages.getMessage('summary');
  public static readonly description = messages.getMessage('description');
  public static readonly examples = messages.getMessages('examples');

  public static readonly args = {
    file: Args.string({
      description: messages.getMessage('args.file.description'),
      required: true,
    }),
    object: Args.string({
      description: messages.getMessage('args.object.description'),
      required: true,
    }),
  };

  public static readonly flags = {
    'target-org': Flags.requiredOrg({
      char: 'o',
      summary: messages.getMessage('flags.target-org.summary'),
      required: true,
    }),
    operation: Flags.string({
      char: 'p',
      summary: messages.getMessage('flags.operation.summary'),
      options: [...OPERATIONS],
      default: 'insert',
    }),
    'external-id-field': Flags.string({
      char: 'x',
      summary: messages.getMessage('flags.external-id-field.summary'),
    }),
    'batch-size': Flags.integer({
      char: 'b',
      summary: messages.getMessage('flags.batch-size.summary'),
      min: 1,
      max: 200,
    }),
    mapping: Flags.string({
      char: 'm',
      summary: messages.getMessage('flags.mapping.summary'),
    }),
    config: Flags.file({
      char: 'c',
      summary: messages.getMessage('flags.config.summary'),
      exists: true,
    }),
  };

  public async run(): Promise<SyncSummary> {
    const { args, flags } = await this.parse(Upload);

    const controller = new AbortController();
    const onInterrupt = (): void => {
      this.warn(messages.getMessage('warnings.cancelling'));
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      const config = loadConfig(flags.config);
      const decisions: DecisionProvider = flags.mapping
        ? new ScriptedDecisionProvider({ mapping: parseMappingFlag(flags.mapping) })
        : new PromptDecisionProvider((line) => this.log(line));
      const service = createDataOpsService({ org: flags['target-org'], config, decisions });

      const reporter = new DispatchReporter(`Uploading to ${args.object}...\n`);
      const summary = await service.sync({
        filePath: args.file,
        objectName: args.object,
        operation: flags.operation,
        batchSize: flags['batch-size'],
        externalIdField: flags['external-id-field'],
        signal: controller.signal,
        onProgress: (progress) => reporter.onProgress(progress),
      });
      reporter.finish();

      for (const line of formatSyncSummary(summary)) {
        this.log(line);
      }
      return summary;
    } catch (error) {
      this.error(describeError(error));
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  }
}
