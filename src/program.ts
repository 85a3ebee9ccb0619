import { Command } from 'commander';
import { configReport, readEnv } from './config.js';
import { statisticsLines, taskTable, userTable } from './format.js';
import { silentLogger, type Logger } from './log.js';
import { PRIORITY_LABELS, serializeTask, serializeUser, STATUS_LABELS, type Task, type User } from './model.js';
import { parseDueDate, parseIdList, parsePriority, parseStatus } from './parse.js';
import type { TrackerEngine } from './tracker/engine.js';

export interface ProgramDeps {
  engine: TrackerEngine;
  /** Receives every stdout line. Default: console.log. */
  out?: (line: string) => void;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

type FormatOpts = { format?: string };

const FORMAT_OPTION = ['--format <format>', 'Output format: pretty|json', 'pretty'] as const;

/**
 * Build the command tree around an existing engine. A fresh Command is needed
 * per parse (commander keeps option values between runs), the engine is not.
 */
export function createProgram(deps: ProgramDeps): Command {
  const { engine } = deps;
  const out = deps.out ?? ((line: string) => console.log(line));
  const logger = deps.logger ?? silentLogger;

  const print = (lines: string[]) => {
    for (const l of lines) out(l);
  };

  const printTasks = (tasks: Task[], opts: FormatOpts) => {
    if (opts.format === 'json') out(JSON.stringify(tasks.map(serializeTask), null, 2));
    else print(taskTable(tasks));
  };

  const printUsers = (users: User[], opts: FormatOpts) => {
    if (opts.format === 'json') out(JSON.stringify(users.map(serializeUser), null, 2));
    else print(userTable(users));
  };

  const program = new Command();

  program
    .name('task-tracker')
    .description('Track users, tasks and who is assigned to what')
    .version('0.1.0')
    // must precede .command() so subcommands inherit it
    .exitOverride();

  program.hook('preAction', (_root, action) => {
    logger.debug(`run ${action.name()}`, action.args);
  });

  // users

  program
    .command('add-user')
    .description('Add a new user')
    .argument('<name>')
    .argument('<email>')
    .argument('[role]', 'Role', 'User')
    .action((name: string, email: string, role: string) => {
      const user = engine.createUser(name, email, role);
      print([
        'User created successfully!',
        `ID: ${user.id}`,
        `Name: ${user.name}`,
        `Email: ${user.email}`,
        `Role: ${user.role}`,
      ]);
    });

  program
    .command('list-users')
    .description('List all users')
    .option(...FORMAT_OPTION)
    .action((opts: FormatOpts) => printUsers(engine.listUsers(), opts));

  program
    .command('update-user')
    .description('Update name, email or role of a user')
    .argument('<userId>')
    .option('--name <name>')
    .option('--email <email>')
    .option('--role <role>')
    .action((userId: string, opts: { name?: string; email?: string; role?: string }) => {
      const ok = engine.updateUser(userId, { name: opts.name, email: opts.email, role: opts.role });
      out(ok ? 'User updated successfully!' : 'User not found.');
    });

  program
    .command('delete-user')
    .description('Delete a user and unassign it from every task')
    .argument('<userId>')
    .action((userId: string) => {
      out(engine.deleteUser(userId) ? 'User deleted successfully!' : 'User not found.');
    });

  // tasks

  program
    .command('add-task')
    .description('Add a new task')
    .argument('<title>')
    .option('--desc <description>')
    .option('--priority <priority>', 'low|medium|high|urgent')
    .option('--due <date>', 'YYYY-MM-DD')
    .action((title: string, opts: { desc?: string; priority?: string; due?: string }) => {
      const task = engine.createTask(title, {
        description: opts.desc,
        priority: opts.priority === undefined ? undefined : parsePriority(opts.priority),
        dueDate: opts.due === undefined ? undefined : parseDueDate(opts.due),
      });
      print([
        'Task created successfully!',
        `ID: ${task.id}`,
        `Title: ${task.title}`,
        `Status: ${STATUS_LABELS[task.status]}`,
        `Priority: ${PRIORITY_LABELS[task.priority]}`,
      ]);
    });

  program
    .command('list-tasks')
    .description('List all tasks')
    .option(...FORMAT_OPTION)
    .action((opts: FormatOpts) => printTasks(engine.listTasks(), opts));

  program
    .command('update-task')
    .description('Update fields of a task')
    .argument('<taskId>')
    .option('--title <title>')
    .option('--desc <description>')
    .option('--status <status>', 'todo|progress|done')
    .option('--priority <priority>', 'low|medium|high|urgent')
    .option('--due <date>', 'YYYY-MM-DD')
    .action(
      (
        taskId: string,
        opts: { title?: string; desc?: string; status?: string; priority?: string; due?: string },
      ) => {
        const ok = engine.updateTask(taskId, {
          title: opts.title,
          description: opts.desc,
          status: opts.status === undefined ? undefined : parseStatus(opts.status),
          priority: opts.priority === undefined ? undefined : parsePriority(opts.priority),
          dueDate: opts.due === undefined ? undefined : parseDueDate(opts.due),
        });
        out(ok ? 'Task updated successfully!' : 'Task not found.');
      },
    );

  program
    .command('delete-task')
    .description('Delete a task')
    .argument('<taskId>')
    .action((taskId: string) => {
      out(engine.deleteTask(taskId) ? 'Task deleted successfully!' : 'Task not found.');
    });

  // assignment

  program
    .command('assign-task')
    .description('Assign a task to a user')
    .argument('<taskId>')
    .argument('<userId>')
    .action((taskId: string, userId: string) => {
      out(engine.assignTaskToUser(taskId, userId) ? 'Task assigned successfully!' : 'Task or user not found.');
    });

  program
    .command('unassign-task')
    .description('Remove a user from a task')
    .argument('<taskId>')
    .argument('<userId>')
    .action((taskId: string, userId: string) => {
      out(engine.unassignTaskFromUser(taskId, userId) ? 'Task unassigned successfully!' : 'Task not found.');
    });

  program
    .command('reassign-task')
    .description('Replace all assignees of a task')
    .argument('<taskId>')
    .argument('<userIds>', 'Comma-separated user ids')
    .action((taskId: string, userIds: string) => {
      const ok = engine.reassignTask(taskId, parseIdList(userIds));
      out(ok ? 'Task reassigned successfully!' : 'Task not found or invalid user IDs.');
    });

  // views

  program
    .command('view-by-user')
    .description('Tasks assigned to a user')
    .argument('<userId>')
    .option(...FORMAT_OPTION)
    .action((userId: string, opts: FormatOpts) => {
      const user = engine.getUser(userId);
      if (!user) {
        out('User not found.');
        return;
      }
      if (opts.format !== 'json') out(`Tasks assigned to ${user.name} (${user.email}):`);
      printTasks(engine.tasksByUser(userId), opts);
    });

  program
    .command('view-by-status')
    .description('Tasks with a status (todo|progress|done)')
    .argument('<status>')
    .option(...FORMAT_OPTION)
    .action((token: string, opts: FormatOpts) => {
      const status = parseStatus(token);
      if (opts.format !== 'json') out(`Tasks with status '${STATUS_LABELS[status]}':`);
      printTasks(engine.tasksByStatus(status), opts);
    });

  program
    .command('view-by-priority')
    .description('Tasks with a priority (low|medium|high|urgent)')
    .argument('<priority>')
    .option(...FORMAT_OPTION)
    .action((token: string, opts: FormatOpts) => {
      const priority = parsePriority(token);
      if (opts.format !== 'json') out(`Tasks with priority '${PRIORITY_LABELS[priority]}':`);
      printTasks(engine.tasksByPriority(priority), opts);
    });

  program
    .command('view-due')
    .description('Tasks due between two dates, inclusive (use - for an open bound)')
    .argument('<from>', 'YYYY-MM-DD or -')
    .argument('<to>', 'YYYY-MM-DD or -')
    .option(...FORMAT_OPTION)
    .action((from: string, to: string, opts: FormatOpts) => {
      const start = from === '-' ? undefined : parseDueDate(from);
      const end = to === '-' ? undefined : parseDueDate(to);
      printTasks(engine.tasksByDueDateRange(start, end), opts);
    });

  program
    .command('view-overdue')
    .description('Tasks past their due date that are not done')
    .option(...FORMAT_OPTION)
    .action((opts: FormatOpts) => {
      if (opts.format !== 'json') out('Overdue tasks:');
      printTasks(engine.overdueTasks(), opts);
    });

  // utility

  program
    .command('search')
    .description('Search task titles and descriptions (case-insensitive)')
    .argument('<query>')
    .option(...FORMAT_OPTION)
    .action((query: string, opts: FormatOpts) => {
      if (opts.format !== 'json') out(`Search results for '${query}':`);
      printTasks(engine.searchTasks(query), opts);
    });

  program
    .command('stats')
    .description('Show task statistics')
    .option(...FORMAT_OPTION)
    .action((opts: FormatOpts) => {
      const stats = engine.taskStatistics();
      if (opts.format === 'json') out(JSON.stringify(stats, null, 2));
      else print(statisticsLines(stats));
    });

  program
    .command('config')
    .description('Print the effective configuration')
    .action(() => {
      const report = configReport(readEnv(deps.env ?? process.env));
      out('task-tracker config');
      out(`logLevel: ${report.logLevel}`);
      out(`strictUpdates: ${report.strictUpdates}`);
      out(`dedupeReassign: ${report.dedupeReassign}`);
      if (report.notes.length) {
        out('');
        out('Notes:');
        for (const n of report.notes) out(`- ${n}`);
      }
    });

  return program;
}
