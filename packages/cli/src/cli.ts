import { Args, Command, Flags } from "@oclif/core";
import chalk from "chalk";

import { CdpAdapter } from "@reqgate/cdp-adapter";
import { ContextRegistry, DispatchEngine } from "@reqgate/core";
import { installRules } from "./stages/install-rules";
import { attachEventLog } from "./stages/log-events";
import { countRules, loadRules } from "./stages/load-rules";
import { withSpinner } from "./utils/with-spinner";

type BrowserTab = { target: string };

const waitForInterrupt = () =>
  new Promise<void>((resolve) => {
    process.once("SIGINT", () => resolve());
  });

export default class ReqgateCommand extends Command {
  static description = "Intercept the requests of a Chrome tab using a rules file.";

  static args = {
    rules: Args.string({
      description: "Path to the rules JSON file",
      required: true
    })
  };

  static flags = {
    help: Flags.help({
      char: "h"
    }),
    host: Flags.string({
      description: "DevTools host (defaults to REQGATE_CDP_HOST or localhost)"
    }),
    port: Flags.integer({
      char: "p",
      description: "DevTools port (defaults to REQGATE_CDP_PORT or 9222)"
    }),
    target: Flags.string({
      char: "t",
      description: "Id of the DevTools target to attach to"
    }),
    url: Flags.string({
      char: "u",
      description: "Navigate the tab to this url once attached"
    }),
    log: Flags.boolean({
      char: "l",
      description: "Print redirects, completed and failed requests"
    }),
    verbose: Flags.boolean({
      char: "v",
      description: "Print dispatch diagnostics"
    })
  };

  async run() {
    const { args, flags } = await this.parse(ReqgateCommand);
    const host = flags.host ?? (process.env.REQGATE_CDP_HOST || "localhost");
    const port = flags.port ?? Number(process.env.REQGATE_CDP_PORT || "9222");
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
      throw new Error("Invalid REQGATE_CDP_PORT.");
    }

    const rules = await withSpinner(
      () => loadRules(args.rules),
      `Loading rules from ${args.rules}`,
      (loaded) => `Loaded ${countRules(loaded)} rules`
    );

    const contexts = new ContextRegistry<BrowserTab>();
    const engine = new DispatchEngine({
      contexts,
      reporter: {
        onError: (error) => {
          this.warn(chalk.yellow(`${error.name}: ${error.message}`));
        },
        onLog: (msg, meta) => {
          if (flags.verbose) {
            this.log(chalk.dim(`${msg} ${JSON.stringify(meta)}`));
          }
        }
      }
    });

    const context: BrowserTab = { target: flags.target ?? "first page" };
    const registry = contexts.createExclusive(context);
    installRules(registry, rules);
    if (flags.log) {
      attachEventLog(registry, (stage, message) => this.log(`${chalk.cyan(stage)} ${message}`));
    }

    const adapter = new CdpAdapter({ host, port, target: flags.target });
    const session = await withSpinner(
      () =>
        adapter.start(
          { kind: "cdp-tab", tabId: 0 },
          {
            engine,
            context,
            onError: (error) => {
              this.warn(chalk.red(error.message));
            }
          }
        ),
      `Attaching to ${host}:${port}`
    );

    if (flags.url) {
      const targetUrl = flags.url;
      await withSpinner(() => session.navigate(targetUrl), `Navigating to ${targetUrl}`);
    }

    const stages = registry.stages();
    const summary = stages.length > 0 ? stages.join(", ") : "no stages";
    this.log(chalk.green(`Listening on ${summary}. Press Ctrl+C to stop.`));

    await waitForInterrupt();
    await withSpinner(() => session.stop(), "Detaching");
    this.log(chalk.green("All done!"));
  }
}
