import { DEFAULT_CONFIG } from "../../src/config.js";
import { acquire, listGranted } from "../../src/state/lock-store.js";
import { readEvents } from "../../src/state/read-events.js";
import { makeTmpRepo, runCli, valueOf } from "./utils.js";

describe("integration: lock contention", () => {
  test("a second writer is refused until the first releases", async () => {
    const { root, paths } = await makeTmpRepo();

    const first = await runCli({ root, args: ["acquire", "src/api.ts", "--agent", "agent-a", "--mode", "write"] });
    expect(first.code).toBe(0);
    const ticketId = valueOf({ lines: first.lines, key: "ticket" });
    expect(valueOf({ lines: first.lines, key: "resource" })).toBe("src/api.ts");
    expect(valueOf({ lines: first.lines, key: "fence" })).toBe("1");

    const second = await runCli({ root, args: ["acquire", "./src/api.ts", "--agent", "agent-b", "--mode", "write"] });
    expect(second).toEqual({ code: 2, lines: ["blocked=incompatible", "holders=agent-a"] });

    const locks = await runCli({ root, args: ["locks"] });
    expect(locks.lines).toHaveLength(1);
    expect(locks.lines[0]).toMatch(new RegExp(`^src/api\\.ts write owner=agent-a priority=0 held=\\d+s ttl=\\d+s ticket=${ticketId}$`));

    expect((await runCli({ root, args: ["release", "--ticket", ticketId] })).lines).toEqual([`released=${ticketId}`]);
    expect((await runCli({ root, args: ["release", "--ticket", ticketId] })).lines).toEqual(["not_found"]);

    const third = await runCli({ root, args: ["acquire", "src/api.ts", "--agent", "agent-b", "--mode", "write"] });
    expect(third.code).toBe(0);
    expect(valueOf({ lines: third.lines, key: "fence" })).toBe("2");

    const kinds = (await readEvents({ eventsLog: paths.eventsLog })).map((event) => event.kind);
    expect(kinds).toEqual(["acquire", "blocked", "release", "acquire"]);
  });

  test("readers share while a writer waits", async () => {
    const { root } = await makeTmpRepo();
    expect((await runCli({ root, args: ["acquire", "docs/a.md", "--agent", "agent-a", "--mode", "read"] })).code).toBe(0);
    expect((await runCli({ root, args: ["acquire", "docs/a.md", "--agent", "agent-b", "--mode", "read"] })).code).toBe(0);
    const writer = await runCli({ root, args: ["acquire", "docs/a.md", "--agent", "agent-c", "--mode", "write"] });
    expect(writer.code).toBe(2);
    expect(valueOf({ lines: writer.lines, key: "holders" }).split(",").sort()).toEqual(["agent-a", "agent-b"]);
  });

  test("racing agents never end up holding incompatible modes", async () => {
    const { paths } = await makeTmpRepo();
    const config = { ...DEFAULT_CONFIG, guardWaitMs: 5_000 };
    const modes = ["read", "write", "read", "exclusive", "read", "write", "read", "write"] as const;
    await Promise.all(
      modes.map((mode, index) =>
        acquire({ paths, config, request: { resource: "shared.json", mode, owner: `agent-${index}` } }),
      ),
    );
    const granted = await listGranted({ paths });
    expect(granted.length).toBeGreaterThan(0);
    const allReads = granted.every((ticket) => ticket.mode === "read");
    expect(allReads || granted.length === 1).toBe(true);
  });
});
