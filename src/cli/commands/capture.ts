/**
 * `flowvault capture`: run the recording proxy in the foreground.
 */

import { Command } from "commander";
import { createCaptureProxy, ensureCaCertificate } from "../../capture/proxy.js";
import { FlowRecorder } from "../../capture/recorder.js";
import { getErrorMessage } from "../../shared/errors.js";
import { formatHint } from "../formatters/hints.js";
import type { FlowStore } from "../../store/flow-store.js";
import { closeLoggers, formatCommandError, openStore, parseIntFlag, resolveContext } from "./helpers.js";

export const captureCommand = new Command("capture")
  .description("Run an intercepting proxy and record every flow into the store")
  .option("-p, --port <port>", "port to listen on (random when omitted)")
  .action(async (opts: { port?: string }, command: Command) => {
    const context = resolveContext(command);
    const { paths, config, logger } = context;
    const port = opts.port === undefined ? undefined : parseIntFlag(opts.port, "--port");

    let store: FlowStore;
    try {
      store = openStore(context);
    } catch (err) {
      console.error(formatCommandError(err));
      closeLoggers(context);
      process.exit(1);
    }
    const captureLogger = logger.forComponent("capture");
    const closeAll = (): void => {
      store.close();
      captureLogger.close();
      closeLoggers(context);
    };

    try {
      await ensureCaCertificate(paths.caKeyFile, paths.caCertFile, logger);
      const recorder = new FlowRecorder(store, captureLogger);
      const proxy = await createCaptureProxy({
        port,
        recorder,
        caKeyPath: paths.caKeyFile,
        caCertPath: paths.caCertFile,
        maxBodySize: config.maxBodySize,
        logger: captureLogger,
      });

      console.log(`Capturing on ${proxy.url}`);
      console.log(`CA certificate: ${paths.caCertFile}`);
      console.log(`Flows are stored in ${paths.databaseFile}`);
      const hint = formatHint([`export HTTPS_PROXY=${proxy.url}`, "Ctrl+C to stop"]);
      if (hint) console.log(hint);

      const shutdown = async (): Promise<void> => {
        await proxy.stop();
        const { recorded, skipped } = recorder.stats();
        console.log(`\nRecorded ${recorded} flow updates (${skipped} skipped)`);
        closeAll();
        process.exit(0);
      };

      const onSignal = (): void => {
        shutdown().catch((err: unknown) => {
          console.error(`Error stopping proxy: ${getErrorMessage(err)}`);
          process.exit(1);
        });
      };
      process.once("SIGINT", onSignal);
      process.once("SIGTERM", onSignal);
    } catch (err) {
      console.error(`Error starting capture: ${getErrorMessage(err)}`);
      closeAll();
      process.exit(1);
    }
  });
