/**
 * sf dataops enrich
 *
 * Look up company details on the web for one or more records, show the
 * proposed changes and update each record after confirmation.
 */

import { Flags, SfCommand } from '@salesforce/sf-plugins-core';
import { Args } from '@oclif/core';
import { Messages } from '@salesforce/core';
import { createDataOpsService } from '../../../core/api-service.js';
import type { DecisionProvider, EnrichmentOutcome } from '../../../core/types.js';
import { loadConfig } from '../../../config/dataops-config.js';
import {
  PromptDecisionProvider,
  ScriptedDecisionProvider,
  formatDiffTable,
} from '../../../services/decisions.js';
import { describeError, formatEnrichmentOutcome } from '../../utils/format.js';

Messages.importMessagesDirectoryFromMetaUrl(import.meta.url);
const messages = Messages.loadMessages('sf-dataops', 'dataops.enrich');

export default class Enrich extends SfCommand<EnrichmentOutcome[]> {
  public static readonly summary = messages.getMessage('summary');
  public static readonly description = messages.getMessage('description');
  public static readonly examples = messages.getMessages('examples');

  // Record ids are variadic
  public static readonly strict = false;

  public static readonly args = {
    objectType: Args.string({
      description: messages.getMessage('args.objectType.description'),
      required: true,
    }),
    recordId: Args.string({
      description: messages.getMessage('args.recordId.description'),
      required: true,
    }),
  };

  public static readonly flags = {
    'target-org': Flags.requiredOrg({
      char: 'o',
      summary: messages.getMessage('flags.target-org.summary'),
      required: true,
    }),
    fields: Flags.string({
      char: 'f',
      summary: messages.getMessage('flags.fields.summary'),
      multiple: true,
      delimiter: ',',
    }),
    yes: Flags.boolean({
      char: 'y',
      summary: messages.getMessage('flags.yes.summary'),
      default: false,
    }),
    config: Flags.file({
      char: 'c',
      summary: messages.getMessage('flags.config.summary'),
      exists: true,
    }),
  };

  public async run(): Promise<EnrichmentOutcome[]> {
    const { args, argv, flags } = await this.parse(Enrich);
    const recordIds = argv.filter((value): value is string => typeof value === 'string').slice(1);

    try {
      const config = loadConfig(flags.config);
      const decisions: DecisionProvider = flags.yes
        ? new ScriptedDecisionProvider({ confirm: true })
        : new PromptDecisionProvider((line) => this.log(line));
      const service = createDataOpsService({ org: flags['target-org'], config, decisions });

      const outcomes = await service.enrichMany(recordIds, args.objectType, flags.fields);

      for (const outcome of outcomes) {
        this.log(formatEnrichmentOutcome(outcome));
        if (flags.yes && outcome.changes.length > 0) {
          for (const line of formatDiffTable(outcome.changes)) {
            this.log(`  ${line}`);
          }
        }
      }
      return outcomes;
    } catch (error) {
      this.error(describeError(error));
    }
  }
}
