import {
  type PagedDataSource,
  type PickerSnapshot,
  createPagedResult,
  resolveKeyBindings,
  resolvePickerOptions,
} from "@listnav/core";
import { readPickerEnv, runPicker } from "@listnav/node";

type Blob = { name: string; sizeBytes: number };

const TOTAL = 2_000;

// Pretend listing service: 40ms per page, offset tokens.
const source: PagedDataSource<Blob> = {
  async fetchPage(request, signal) {
    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(resolve, 40);
      signal.addEventListener(
        "abort",
        () => {
          clearTimeout(timer);
          reject(new Error("listing aborted"));
        },
        { once: true },
      );
    });
    const start = request.continuationToken === null ? 0 : Number(request.continuationToken);
    const end = Math.min(TOTAL, start + request.pageSize);
    const items: Blob[] = [];
    for (let i = start; i < end; i++) {
      items.push({ name: `logs/2024/${String(i).padStart(5, "0")}.json`, sizeBytes: i * 37 });
    }
    return createPagedResult(items, end < TOTAL ? String(end) : null);
  },
};

function render(snapshot: PickerSnapshot<Blob>): void {
  const lines = [`/${snapshot.query}`];
  for (let i = snapshot.windowStart; i < snapshot.windowEnd; i++) {
    const row = snapshot.filtered[i];
    if (row === undefined) continue;
    lines.push(`${i === snapshot.index ? ">" : " "} ${row.item.name}`);
  }
  const status = snapshot.loading ? "loading..." : snapshot.hasMore ? "more available" : "end";
  lines.push(`${snapshot.filtered.length}/${snapshot.totalLoaded} ${status}`);
  process.stdout.write(`\u001b[2J\u001b[H${lines.join("\r\n")}\r\n`);
}

const env = readPickerEnv();
const outcome = await runPicker<Blob>({
  source,
  keyOf: (blob) => [blob.name],
  options: resolvePickerOptions({ pageSize: 200, ...env.options }),
  keyBindings: resolveKeyBindings(env.keyBindings),
  render,
  onAction: (action) => {
    if (action === "help") process.stdout.write("j/k move, gg/G top/bottom, / search, q quit\r\n");
  },
});

process.stdout.write(
  outcome.kind === "confirmed" ? `${outcome.item.name}\n` : `cancelled (${outcome.reason})\n`,
);
