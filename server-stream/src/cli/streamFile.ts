#!/usr/bin/env node
import fs from "node:fs";
import WebSocket from "ws";
import { hideBin } from "yargs/helpers";
import { parseStreamFileArgs } from "./args.js";
import { rawDataToBuffer } from "../stt/sttManager.js";
import { decodeClip, SESSION_SAMPLE_RATE } from "../stt/wav.js";

const isSessionEnded = (text: string): boolean => {
  try {
    const event: unknown = JSON.parse(text);
    return typeof event === "object" && event !== null && "type" in event && event.type === "session_ended";
  } catch {
    return false;
  }
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const main = async (): Promise<void> => {
  const args = await parseStreamFileArgs(hideBin(process.argv));
  const chunkMs = args["chunk-ms"];

  const clip = decodeClip(fs.readFileSync(args.file));
  if (clip.sampleRate !== SESSION_SAMPLE_RATE || clip.channels !== 1 || clip.bitsPerSample !== 16) {
    throw new Error(`Expected ${SESSION_SAMPLE_RATE}Hz mono 16-bit audio, got ${clip.sampleRate}Hz ${clip.channels}ch.`);
  }
  const chunkBytes = Math.max(2, Math.round((SESSION_SAMPLE_RATE * chunkMs) / 1000) * 2);

  const ws = new WebSocket(args.url);
  const ended = new Promise<void>((resolve, reject) => {
    ws.on("message", (data, isBinary) => {
      if (isBinary) return;
      const text = rawDataToBuffer(data).toString("utf8");
      process.stdout.write(`${text}\n`);
      if (isSessionEnded(text)) {
        ws.close();
        resolve();
      }
    });
    ws.on("close", () => resolve());
    ws.on("error", reject);
  });

  await new Promise<void>((resolve, reject) => {
    ws.once("open", () => resolve());
    ws.once("error", reject);
  });

  ws.send(JSON.stringify({ command: "start", language: args.language, format: "pcm16" }));
  for (let offset = 0; offset < clip.pcm.length; offset += chunkBytes) {
    ws.send(clip.pcm.subarray(offset, offset + chunkBytes));
    if (args.realtime) await sleep(chunkMs);
  }
  ws.send(JSON.stringify({ command: "stop" }));
  await ended;
};

main().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
