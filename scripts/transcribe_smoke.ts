// scripts/transcribe_smoke.ts
import fs from "node:fs";
import path from "node:path";

const BASE_URL = process.env.SERVICE_URL ?? "http://127.0.0.1:6500";

function mimeTypeFor(filePath: string): string {
  return path.extname(filePath).toLowerCase() === ".mp3" ? "audio/mpeg" : "audio/wav";
}

async function main() {
  const audioPath = process.argv[2];
  if (!audioPath) {
    console.error("Usage: tsx scripts/transcribe_smoke.ts <file.wav|file.mp3>");
    process.exit(2);
  }

  const form = new FormData();
  form.append("file", new Blob([fs.readFileSync(audioPath)], { type: mimeTypeFor(audioPath) }), path.basename(audioPath));

  const res = await fetch(`${BASE_URL}/transcribe`, { method: "POST", body: form });
  console.log("status:", res.status);
  console.log(await res.text());
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
