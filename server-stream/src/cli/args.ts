import yargs from "yargs";

export type StreamFileArgsOptions = {
  /** Let yargs exit after `--help` or `--version`. */
  exitProcess?: boolean;
};

export async function parseStreamFileArgs(argv: string[], opts: StreamFileArgsOptions = {}) {
  return yargs(argv)
    .scriptName("stream-stt-file")
    .command("$0 <file>", "Stream a 16 kHz mono 16-bit file to the streaming endpoint, then send stop", (y) =>
      y.positional("file", { type: "string", demandOption: true, describe: "WAV or raw PCM16 file" })
    )
    .option("url", {
      type: "string",
      default: process.env.STT_URL ?? "ws://127.0.0.1:8765/ws/stream",
      describe: "Streaming endpoint"
    })
    .option("language", { type: "string", describe: "Language hint sent with start" })
    .option("chunk-ms", { type: "number", default: 100, describe: "Audio per message" })
    .option("realtime", { type: "boolean", default: false, describe: "Pace chunks at playback speed" })
    .check((args) => {
      if (!Number.isFinite(args["chunk-ms"]) || args["chunk-ms"] <= 0) {
        throw new Error(`Invalid --chunk-ms: ${args["chunk-ms"]}`);
      }
      return true;
    })
    .fail((msg, err) => {
      throw err ?? new Error(msg);
    })
    .strict()
    .help()
    .exitProcess(opts.exitProcess ?? true)
    .parse();
}
