import chalk from "chalk";
import { ConfigurationError } from "@vpnkeeper/core";
import { createProgram } from "./program";
import { RecordingOutput, ScriptedPrompt, createFakeEngine } from "./__tests__/fakes";
import type { FakeEngine } from "./__tests__/fakes";

describe("createProgram", () => {
  let output: RecordingOutput;
  let engine: FakeEngine;
  let createEngine: jest.Mock;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    output = new RecordingOutput();
    engine = createFakeEngine();
    createEngine = jest.fn().mockResolvedValue(engine);
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  function run(args: string[], prompt = new ScriptedPrompt()) {
    const program = createProgram({ createOutput: () => output, createEngine, prompt });
    return program.parseAsync(args, { from: "user" });
  }

  it("passes global options to the engine factory", async () => {
    await run(["--config", "/tmp/vpn.json", "--state", "/tmp/state.json", "deploy", "--zone", "europe-west1-b"]);

    expect(createEngine).toHaveBeenCalledWith(
      expect.objectContaining({ config: "/tmp/vpn.json", state: "/tmp/state.json" }),
      output.log
    );
    expect(engine.deploy).toHaveBeenCalledWith(
      { zone: "europe-west1-b" },
      { signal: expect.any(AbortSignal) }
    );
  });

  it("routes deploy-and-connect", async () => {
    await run(["deploy-and-connect"]);

    expect(engine.deployAndConnect).toHaveBeenCalledWith({ zone: undefined }, expect.anything());
  });

  it("accepts status-check as an alias", async () => {
    await run(["status-check"]);

    expect(engine.statusCheck).toHaveBeenCalledTimes(1);
  });

  it("passes --yes and --show-secrets through", async () => {
    await run(["delete", "--yes"]);
    await run(["view-config", "--show-secrets"]);

    expect(engine.delete).toHaveBeenCalledTimes(1);
    expect(engine.viewConfig).toHaveBeenCalledWith({ showSecrets: true });
  });

  it("runs the menu by default", async () => {
    await run([], new ScriptedPrompt(["exit"]));

    expect(engine.inspect).toHaveBeenCalledTimes(1);
  });

  it("prints engine errors with suggestions and sets the exit code", async () => {
    engine.connect.mockResolvedValue({
      success: false,
      error: new ConfigurationError("Tunnel config /etc/wireguard/wg0.conf does not exist", [
        "Create it from the client template",
      ]),
    });

    await run(["connect"]);

    expect(output.events).toContainEqual({
      type: "error",
      text: "Tunnel config /etc/wireguard/wg0.conf does not exist",
      suggestions: ["Create it from the client template"],
    });
    expect(process.exitCode).toBe(1);
  });

  it("reports a config that cannot be loaded", async () => {
    createEngine.mockRejectedValue(
      new ConfigurationError("Config file not found: /tmp/missing.json", ["Run 'vpnkeeper init' to create one"])
    );

    await run(["start"]);

    expect(output.events).toContainEqual({
      type: "error",
      text: "Config file not found: /tmp/missing.json",
      suggestions: ["Run 'vpnkeeper init' to create one"],
    });
    expect(process.exitCode).toBe(1);
  });

  it("removes its interrupt handler after each command", async () => {
    const before = process.listenerCount("SIGINT");

    await run(["stop"]);

    expect(process.listenerCount("SIGINT")).toBe(before);
  });
});
