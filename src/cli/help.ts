/**
 * CLI Help Text
 */

/** Get the usage text */
export function getUsageText(): string {
  return `Usage: handoff [task text] [options]

Starts an interactive shell that drives a Manager CLI and hands its
instructions to your editor through dev_instructions/next_step.txt.
The editor answers by writing dev_logs/worker_output.txt.

Options:
  --project <name>               Select a saved project on startup
  --backend <tool>               Manager CLI to drive (claude|codex|mock) (default: claude)
  --mock                         Same as --backend mock
  --model <model>                Model passed to the Manager CLI
  --data-dir <path>              Where projects.json lives (default: ~/.config/handoff)
  --result-timeout <seconds>     How long to wait for the Worker result (default: 600)
  --backend-timeout <seconds>    Bound on one Manager call (default: 120)
  --summary-interval <n>         Summarize the history every n turns, 0 to disable (default: 10)
  --max-history-turns <n>        Turns sent to the Manager per call (default: 20)
  --no-interactive               Run the task text once for --project and exit
  --verbose                      Show state changes
  --debug                        Show debug logs
  --json                         Print engine events as JSON lines
  -h, --help                     Show this help message
  -v, --version                  Show version number

Examples:
  handoff
  handoff --project shop "Add a CSV export for orders"
  handoff --project shop --no-interactive "Fix the failing checkout test"
  handoff --mock --project demo`;
}

/** Commands available inside the shell */
export function getCommandHelpText(): string {
  return `Commands:
  project list                 List saved projects
  project add                  Add a project (prompts for name, workspace, goal)
  project select <name>        Make a project active
  start [text]                 Start a task, optionally with instructions for the Manager
  input <text>                 Answer the Manager's question
  status                       Show the engine state
  history [n]                  Show the last n turns (default 10)
  pause                        Stop watching for the Worker result
  stop                         Abandon the current task
  help                         Show this list
  quit                         Leave the shell`;
}

/** Print usage to stderr */
export function printUsage(): void {
  console.error(getUsageText());
}
