import { Command } from "commander";
import { VPNKEEPER_VERSION, isVpnError, toError } from "@vpnkeeper/core";
import type { LogCallback } from "@vpnkeeper/core";
import { InitHandler } from "./commands/init.handler";
import type { InitOptions } from "./commands/init.handler";
import { MenuHandler } from "./commands/menu.handler";
import { VpnCommandHandler } from "./commands/vpn.handler";
import type {
  DeleteCommandOptions,
  DeployCommandOptions,
  ViewConfigCommandOptions,
  VpnEngine,
} from "./commands/vpn.handler";
import { configPathFor, createEngine } from "./context";
import type { GlobalOptions } from "./context";
import type { IOutputService } from "./interfaces/output.interface";
import type { IPromptService } from "./interfaces/prompt.interface";
import { ConsoleOutputService } from "./services/console-output.service";
import { InquirerPromptService } from "./services/inquirer-prompt.service";

export interface ProgramDeps {
  createOutput?: (verbose: boolean) => IOutputService;
  prompt?: IPromptService;
  createEngine?: (options: GlobalOptions, log: LogCallback) => Promise<VpnEngine>;
}

export function reportError(output: IOutputService, error: unknown): void {
  if (isVpnError(error)) {
    output.error(error.message, error.suggestions);
  } else {
    output.error(toError(error).message);
  }
  process.exitCode = 1;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const makeOutput = deps.createOutput ?? ((verbose: boolean) => new ConsoleOutputService(verbose));
  const makeEngine = deps.createEngine ?? createEngine;
  const prompt = deps.prompt ?? new InquirerPromptService();

  const program = new Command();
  program.exitOverride();

  program
    .name("vpnkeeper")
    .description("Single-tenant WireGuard VPN on Google Compute Engine")
    .version(VPNKEEPER_VERSION)
    .option("-c, --config <path>", "Config file (default: ~/.vpnkeeper/config.json)")
    .option("-s, --state <path>", "State file (default: ~/.vpnkeeper/state.json)")
    .option("-v, --verbose", "Print every progress line");

  /** Runs one handler call with Ctrl+C wired to cancellation. */
  async function withVpn(
    command: Command,
    action: (vpn: VpnCommandHandler, output: IOutputService) => Promise<unknown>
  ): Promise<void> {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const output = makeOutput(globals.verbose === true);
    const controller = new AbortController();
    const onInterrupt = () => {
      output.warn("Interrupted, stopping after the current step...");
      controller.abort();
    };
    process.once("SIGINT", onInterrupt);

    try {
      const engine = await makeEngine(globals, output.log);
      await action(new VpnCommandHandler(output, prompt, engine, controller.signal), output);
    } catch (error: unknown) {
      reportError(output, error);
    } finally {
      process.removeListener("SIGINT", onInterrupt);
    }
  }

  program
    .command("menu", { isDefault: true })
    .description("Interactive menu (default)")
    .action((_options: object, command: Command) =>
      withVpn(command, (vpn, output) => new MenuHandler(output, prompt, vpn).execute())
    );

  program
    .command("init")
    .description("Write a starter config file")
    .option("-p, --project <id>", "GCP project ID")
    .option("-z, --zone <zone>", "Zone to deploy into")
    .option("-f, --force", "Overwrite an existing config")
    .action(async (options: InitOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const output = makeOutput(globals.verbose === true);
      try {
        await new InitHandler(output, prompt, configPathFor(globals)).execute(options);
      } catch (error: unknown) {
        reportError(output, error);
      }
    });

  program
    .command("deploy")
    .description("Create the VPN server, or resume a deploy that stopped part way")
    .option("-z, --zone <zone>", "Zone to deploy into (default: from config)")
    .action((options: DeployCommandOptions, command: Command) =>
      withVpn(command, (vpn) => vpn.deploy(options))
    );

  program
    .command("deploy-and-connect")
    .description("Deploy the VPN server and bring the tunnel up")
    .option("-z, --zone <zone>", "Zone to deploy into (default: from config)")
    .action((options: DeployCommandOptions, command: Command) =>
      withVpn(command, (vpn) => vpn.deployAndConnect(options))
    );

  program
    .command("start")
    .description("Start a stopped VPN server")
    .action((_options: object, command: Command) => withVpn(command, (vpn) => vpn.start()));

  program
    .command("stop")
    .description("Stop the VPN server, disconnecting first")
    .action((_options: object, command: Command) => withVpn(command, (vpn) => vpn.stop()));

  program
    .command("delete")
    .description("Delete the VPN server")
    .option("-y, --yes", "Skip the confirmation prompt")
    .action((options: DeleteCommandOptions, command: Command) =>
      withVpn(command, (vpn) => vpn.delete(options))
    );

  program
    .command("connect")
    .description("Bring the local tunnel up against the running server")
    .action((_options: object, command: Command) => withVpn(command, (vpn) => vpn.connect()));

  program
    .command("disconnect")
    .description("Bring the local tunnel down")
    .action((_options: object, command: Command) => withVpn(command, (vpn) => vpn.disconnect()));

  program
    .command("status")
    .alias("status-check")
    .description("Show server state, connectivity and egress address")
    .action((_options: object, command: Command) => withVpn(command, (vpn) => vpn.status()));

  program
    .command("view-config")
    .description("Print the local tunnel config")
    .option("--show-secrets", "Include the private key")
    .action((options: ViewConfigCommandOptions, command: Command) =>
      withVpn(command, (vpn) => vpn.viewConfig(options))
    );

  return program;
}
