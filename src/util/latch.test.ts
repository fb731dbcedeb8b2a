import { Latch } from "./latch";

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

it("runs holders one at a time in arrival order", async () => {
  const latch = new Latch();
  const events: string[] = [];

  const task = (name: string) =>
    latch.withLock(async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
    });

  await Promise.all([task("a"), task("b"), task("c")]);

  expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
});

it("releases the lock when the holder throws", async () => {
  const latch = new Latch();

  await expect(
    latch.withLock(async () => {
      throw new Error("boom");
    })
  ).rejects.toThrow("boom");

  await expect(latch.withLock(async () => "next")).resolves.toBe("next");
});
