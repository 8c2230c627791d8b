// scripts/tts_smoke.ts
const BASE_URL = process.env.SERVICE_URL ?? "http://127.0.0.1:6500";

async function main() {
  const text = process.argv[2];
  const model = process.argv[3];
  if (!text) {
    console.error("Usage: tsx scripts/tts_smoke.ts <text> [model]");
    process.exit(2);
  }

  // Second request should come back cached.
  for (const attempt of [1, 2]) {
    const startedAt = Date.now();
    const res = await fetch(`${BASE_URL}/tts`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(model ? { text, model } : { text }),
    });
    const body = await res.text();
    console.log(`attempt ${attempt}: status ${res.status} in ${Date.now() - startedAt}ms`);
    console.log(body);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
