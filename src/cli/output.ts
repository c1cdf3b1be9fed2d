import chalk from 'chalk';
import { Table } from 'console-table-printer';
import type { SubscriberStatsReport, SystemStats } from '../delivery/subscription-service';
import type { RunReport, SubscriberOutcomeStatus } from '../delivery/types';
import type { SystemHealth } from '../system/system';

const STATUS_COLORS = {
  success: 'green',
  failure: 'red',
  'no-content-available': 'yellow',
  'not-attempted': 'white_bold'
} as const satisfies Record<SubscriberOutcomeStatus, string>;

export function printRunReport(report: RunReport): void {
  const { summary } = report;
  const seconds = ((report.finishedAt.getTime() - report.startedAt.getTime()) / 1000).toFixed(1);

  console.log(chalk.blue(`Run ${report.runId} (${report.trigger}) finished in ${seconds}s`));

  if (report.entries.length === 0) {
    console.log(chalk.yellow('No active subscribers'));
  } else {
    const table = new Table({
      columns: [
        { name: 'subscriber', title: 'Subscriber', alignment: 'left' },
        { name: 'problem', title: 'Problem', alignment: 'left' },
        { name: 'status', title: 'Status', alignment: 'left' },
        { name: 'stage', title: 'Stage', alignment: 'left' },
        { name: 'detail', title: 'Detail', alignment: 'left', maxLen: 60 }
      ]
    });

    for (const entry of report.entries) {
      table.addRow({
        subscriber: entry.subscriberId,
        problem: entry.problemId ?? '-',
        status: entry.degraded ? `${entry.status} (degraded)` : entry.status,
        stage: entry.stage ?? '',
        detail: entry.error?.message ?? entry.warning ?? ''
      }, { color: STATUS_COLORS[entry.status] });
    }
    table.printTable();
  }

  const line = `${summary.succeeded} delivered, ${summary.failed} failed, ` +
    `${summary.noContent} without content, ${summary.notAttempted} not attempted ` +
    `(${summary.degraded} degraded) of ${summary.total}`;
  console.log(summary.failed > 0 || summary.notAttempted > 0 ? chalk.yellow(line) : chalk.green(line));

  if (report.timedOut) {
    console.log(chalk.red('Run stopped by the run timeout'));
  } else if (report.cancelled) {
    console.log(chalk.red('Run was cancelled'));
  }
}

export function printHealth(health: SystemHealth): void {
  const table = new Table({
    columns: [
      { name: 'component', title: 'Component', alignment: 'left' },
      { name: 'status', title: 'Status', alignment: 'left' },
      { name: 'message', title: 'Detail', alignment: 'left', maxLen: 70 }
    ]
  });

  for (const [component, result] of Object.entries(health.components)) {
    table.addRow({
      component,
      status: result.healthy ? 'ok' : 'unhealthy',
      message: result.message ?? ''
    }, { color: result.healthy ? 'green' : 'red' });
  }
  table.printTable();

  console.log(health.healthy ? chalk.green('✓ All collaborators healthy') : chalk.red('✗ Some collaborators are unhealthy'));
}

export function printSubscriberStats(report: SubscriberStatsReport): void {
  const { subscriber, stats } = report;
  console.log(chalk.blue(`Subscriber ${subscriber.identity}`));
  console.log(`  Status:      ${subscriber.active ? 'active' : 'inactive'}`);
  console.log(`  Language:    ${subscriber.language}`);
  console.log(`  Difficulty:  ${subscriber.difficulty}`);
  console.log(`  Delivered:   ${stats.totalDelivered} (easy ${stats.byDifficulty.easy}, medium ${stats.byDifficulty.medium}, hard ${stats.byDifficulty.hard})`);
  console.log(`  Failed:      ${stats.totalFailed}`);
  console.log(`  Last sent:   ${stats.lastDeliveredAt ? stats.lastDeliveredAt.toISOString() : 'never'}`);
}

export function printSystemStats(stats: SystemStats): void {
  const table = new Table({
    columns: [
      { name: 'metric', title: 'Metric', alignment: 'left' },
      { name: 'value', title: 'Value', alignment: 'right' }
    ]
  });

  table.addRows([
    { metric: 'Active subscribers', value: stats.subscribers.active },
    { metric: 'Total subscribers', value: stats.subscribers.total },
    { metric: 'Problems', value: stats.problems.total },
    { metric: '  easy', value: stats.problems.byDifficulty.easy },
    { metric: '  medium', value: stats.problems.byDifficulty.medium },
    { metric: '  hard', value: stats.problems.byDifficulty.hard },
    { metric: 'Successful deliveries', value: stats.deliveries.successful },
    { metric: 'Failed deliveries', value: stats.deliveries.failed }
  ]);
  table.printTable();
}
