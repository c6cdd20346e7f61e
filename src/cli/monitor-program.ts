import { Command } from 'commander';
import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../types/index.js';
import {
  CHANGE_STATUSES,
  CONTENT_TYPE_NAMES,
  CONTENT_TYPE_VARIANTS,
  isContentTypeName,
  nextCheckAt,
  readMonitorDefinitions,
} from '../monitoring/index.js';
import type {
  ChangeStatus,
  ContentMonitor,
  MonitorCheckResult,
  MonitorRegistry,
  MonitoringContext,
} from '../monitoring/index.js';

const logger = createChildLogger('monitor-cli');

export interface MonitorProgramIO {
  /** Open a context for one command; closed when the command ends */
  openContext(): Promise<MonitoringContext>;
  print(line: string): void;
  fail(message: string): void;
}

const defaultIO: Pick<MonitorProgramIO, 'print' | 'fail'> = {
  print: (line) => console.log(line),
  fail: (message) => {
    console.error('Error:', message);
    process.exitCode = 1;
  },
};

function parseStatus(value: string): ChangeStatus {
  const status = CHANGE_STATUSES.find((candidate) => candidate === value.toUpperCase());
  if (!status) {
    throw new Error(`Unknown status "${value}", expected one of ${CHANGE_STATUSES.join(', ')}`);
  }
  return status;
}

function selectMonitors(registry: MonitorRegistry, options: { type?: string; channel?: string }): ContentMonitor[] {
  let monitors = registry.list();
  const type = options.type;
  if (type !== undefined) {
    if (!isContentTypeName(type)) {
      throw new Error(`Unknown content type "${type}", expected one of ${CONTENT_TYPE_NAMES.join(', ')}`);
    }
    monitors = registry.listByContentType(type);
  }
  if (options.channel !== undefined) {
    const onChannel = new Set(registry.listByChannelId(options.channel).map((monitor) => monitor.id));
    monitors = monitors.filter((monitor) => onChannel.has(monitor.id));
  }
  return monitors;
}

function describeResult(detail: MonitorCheckResult): string {
  switch (detail.outcome) {
    case 'change_created':
      return `Change ${detail.changeId} created (${detail.difference}%)`;
    case 'change_updated':
      return `Change ${detail.changeId} updated (${detail.difference}%)`;
    case 'below_threshold':
      return `Below threshold (${detail.difference}%)`;
    case 'failed':
      return `Failed: ${detail.error}`;
    default:
      return detail.outcome.replace('_', ' ');
  }
}

/**
 * Build the monitor CLI
 */
export function createMonitorProgram(io: Partial<MonitorProgramIO> & Pick<MonitorProgramIO, 'openContext'>): Command {
  const { openContext, print, fail } = { ...defaultIO, ...io };
  const rule = (width: number) => print('━'.repeat(width));

  async function withContext(
    description: string,
    action: (context: MonitoringContext) => Promise<void>
  ): Promise<void> {
    let context: MonitoringContext | null = null;
    try {
      context = await openContext();
      await action(context);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, `Failed to ${description}`);
      fail(errorMessage(error));
    } finally {
      await context?.close();
    }
  }

  const program = new Command();

  program
    .name('content-monitor')
    .description('Template-driven content change monitoring CLI')
    .version('1.0.0');

  /**
   * List all monitors
   */
  program
    .command('list')
    .description('List all monitors and their schedule state')
    .option('-t, --type <type>', 'Only list monitors of this content type')
    .option('-c, --channel <id>', 'Only list video monitors of this channel')
    .action((options: { type?: string; channel?: string }) =>
      withContext('list monitors', async ({ service, registry }) => {
        await service.loadMonitors();
        const monitors = selectMonitors(registry, options);

        print('\nMonitors\n');
        rule(80);

        if (monitors.length === 0) {
          print('No monitors found.');
        }
        for (const monitor of monitors) {
          const next = nextCheckAt(monitor);
          print(`\n${monitor.guid} [${service.state(monitor)}]`);
          print(`   Type: ${CONTENT_TYPE_VARIANTS[monitor.contentType].label}`);
          print(`   Template: ${monitor.template}`);
          if (monitor.channelId) {
            print(`   Channel: ${monitor.channelId}`);
          }
          print(`   Interval: ${monitor.interval} min, threshold ${monitor.minDifference}%`);
          print(`   Last checked: ${monitor.lastCheckedAt?.toISOString() ?? 'Never'}`);
          if (next) {
            print(`   Next check: ${next.toISOString()}`);
          }
          if (monitor.pendingChangeId) {
            print(`   Pending change: ${monitor.pendingChangeId}`);
          }
          if (monitor.errorMessage) {
            print(`   Last error (retry ${monitor.retry}): ${monitor.errorMessage}`);
          }
        }

        rule(80);
      })
    );

  /**
   * Create or update monitors from the definitions file
   */
  program
    .command('sync')
    .description('Create or update monitors from the definitions file')
    .option('-f, --file <path>', 'Definitions file (defaults to MONITORS_FILE)')
    .action((options: { file?: string }) =>
      withContext('sync monitors', async ({ config, service }) => {
        const definitions = await readMonitorDefinitions(options.file ?? config.monitoring.definitionsFile);
        await service.loadMonitors();
        const result = await service.syncDefinitions(definitions);
        print(`Synchronized ${definitions.length} definitions: ${result.created} created, ${result.updated} updated`);
      })
    );

  /**
   * Check monitors for changes
   */
  program
    .command('check')
    .description('Check due monitors for changes')
    .option('-m, --monitor <guid>', 'Only check this monitor (id or guid)')
    .option('--force', 'Check even if not due', false)
    .action((options: { monitor?: string; force: boolean }) =>
      withContext('check monitors', async ({ service }) => {
        await service.loadMonitors();
        const result = await service.runDue({ monitor: options.monitor, force: options.force });

        rule(60);
        print('Results:');
        print(`  Monitors checked: ${result.monitorsChecked}`);
        print(`  Changes detected: ${result.changesDetected}`);
        print(`  Failures: ${result.failures}`);
        print(`  Duration: ${result.completedAt.getTime() - result.startedAt.getTime()}ms`);
        rule(60);

        for (const detail of result.details) {
          print(`${detail.guid}: ${describeResult(detail)}`);
        }
      })
    );

  /**
   * Show changes awaiting review and recent decisions
   */
  program
    .command('changes')
    .description('Show NEW changes and recently reviewed ones')
    .option('-s, --status <status>', 'Only show changes with this status')
    .option('-m, --monitor <guid>', 'Only show changes of this monitor')
    .action((options: { status?: string; monitor?: string }) =>
      withContext('list changes', async ({ service }) => {
        await service.loadMonitors();
        const monitorId = options.monitor ? service.getMonitor(options.monitor).id : undefined;
        const changes = await service.listChanges({
          status: options.status ? parseStatus(options.status) : undefined,
          monitorId,
        });

        print('\nChanges\n');
        rule(80);

        if (changes.length === 0) {
          print('No changes recorded.');
        }
        for (const change of changes) {
          const monitor = service.listMonitors().find((candidate) => candidate.id === change.monitorId);
          print(`\n${change.id} [${change.status}] ${monitor?.guid ?? change.monitorId}`);
          print(`   Difference: ${change.difference}%`);
          print(`   Created: ${change.createdAt.toISOString()}`);
          if (change.reviewedBy) {
            print(`   Reviewed by: ${change.reviewedBy}`);
          }
        }

        rule(80);
      })
    );

  /**
   * Move a change through review
   */
  program
    .command('review <id> <status>')
    .description('Set the review status of a change')
    .option('-u, --user <name>', 'Reviewer name')
    .action((id: string, status: string, options: { user?: string }) =>
      withContext('review change', async ({ service }) => {
        await service.loadMonitors();
        const change = await service.reviewChange(id, parseStatus(status), options.user);
        print(`Change ${change.id} is now ${change.status}`);
      })
    );

  /**
   * Show the resolved configuration of a channel template
   */
  program
    .command('resolve <channel>')
    .description('Show the resolved fields of a channel template')
    .action((channel: string) =>
      withContext('resolve template', async ({ templates }) => {
        const configuration = templates.resolve(channel);

        print(`\n${configuration.name}${configuration.providerRef ? ` (provider ${configuration.providerRef})` : ''}`);
        print(`   URL: ${configuration.url ?? '-'}`);
        print(`   Sites: ${configuration.sites || '-'}`);
        print(`   Primary: ${configuration.primaryField}`);
        for (const field of configuration.fields) {
          const spec = field.extractor.toSpec();
          const filters = field.filters.map((filter) => filter.spec.kind).join(', ');
          print(`   ${field.name}: ${spec.expr || '(inert)'} -> ${spec.format} [${spec.match}]`);
          if (filters) {
            print(`      filters: ${filters}`);
          }
        }
      })
    );

  /**
   * List loaded templates and load errors
   */
  program
    .command('templates')
    .description('List loaded templates and any load errors')
    .action(() =>
      withContext('list templates', async ({ templates }) => {
        print(`Providers: ${templates.listProviders().join(', ') || '-'}`);
        print(`Channels: ${templates.listChannels().join(', ') || '-'}`);
        for (const error of templates.errors()) {
          print(`  ${error.kind ?? 'template'} ${error.template}${error.source ? ` (${error.source})` : ''}: ${error.message}`);
        }
      })
    );

  return program;
}
