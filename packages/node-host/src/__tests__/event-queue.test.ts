import { EventQueue } from "../event-queue";

describe("EventQueue", () => {
  it("hands out items pushed before they were asked for", async () => {
    const queue = new EventQueue<number>();
    queue.push(1);
    queue.push(2);

    expect(await queue.next()).toBe(1);
    expect(await queue.next()).toBe(2);
  });

  it("wakes a waiting consumer", async () => {
    const queue = new EventQueue<string>();
    const pending = queue.next();

    queue.push("late");

    await expect(pending).resolves.toBe("late");
  });

  it("drains queued items before repeating the last one", async () => {
    const queue = new EventQueue<string>();
    queue.push("a");
    queue.end("done");
    queue.push("ignored");

    expect(queue.ended).toBe(true);
    expect(await queue.next()).toBe("a");
    expect(await queue.next()).toBe("done");
    expect(await queue.next()).toBe("done");
  });

  it("releases every waiter on end", async () => {
    const queue = new EventQueue<string>();
    const first = queue.next();
    const second = queue.next();

    queue.end("closed");

    await expect(Promise.all([first, second])).resolves.toEqual(["closed", "closed"]);
  });

  it("reports how many items wait for a consumer", async () => {
    const queue = new EventQueue<number>();
    queue.push(1);
    queue.push(2);
    expect(queue.size).toBe(2);

    await queue.next();

    expect(queue.size).toBe(1);
  });
});
