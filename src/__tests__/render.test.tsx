import assert from "node:assert/strict";
import test from "node:test";
import { render } from "ink-testing-library";
import { App } from "../app.js";
import { BrowserController } from "../controller.js";
import { RegistryError } from "../errors.js";
import { FakeRegistryClient, platformImage, step } from "./fixtures.js";

const LONG_STEP = "RUN apt-get update && apt-get install -y curl && rm -rf /var/lib/apt/lists/*";

function setup(): { client: FakeRegistryClient; controller: BrowserController } {
  const client = new FakeRegistryClient({
    tags: { "team/api": ["1.0"], "team/web": ["2.0"], alpine: ["3.20"] },
    images: { "team/api:1.0": [platformImage({ history: [step(LONG_STEP)] })] },
  });
  return {
    client,
    controller: new BrowserController({ client, registryUrl: "https://registry.example.test" }),
  };
}

/** Ink throttles output, so wait until a frame with the expected text is written. */
async function waitForFrame(
  lastFrame: () => string | undefined,
  pattern: RegExp,
  timeoutMs = 2000,
): Promise<string> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const frame = lastFrame() ?? "";
    if (pattern.test(frame)) return frame;
    if (Date.now() >= deadline) assert.fail(`no frame matched ${String(pattern)}:\n${frame}`);
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

test("renders the namespaces pane and the status bar", async () => {
  const { controller } = setup();
  await controller.start();
  const { lastFrame, unmount } = render(<App controller={controller} onFatal={() => undefined} />);

  const frame = await waitForFrame(lastFrame, / • team/);
  assert.match(frame, / Namespaces /);
  assert.match(frame, /2 namespaces/);
  assert.match(frame, / • library/);
  assert.match(frame, /regscope · Ready +enter open · h back/);
  unmount();
});

test("shows the repositories of an opened namespace", async () => {
  const { controller } = setup();
  await controller.start();
  const { lastFrame, unmount } = render(<App controller={controller} onFatal={() => undefined} />);

  await controller.dispatch("move-down");
  await controller.dispatch("activate");

  const frame = await waitForFrame(lastFrame, /Images: team/);
  assert.match(frame, /2 images/);
  assert.match(frame, / • api/);
  assert.match(frame, / • web/);
  unmount();
});

test("a failed query keeps its whole message in the status bar", async () => {
  const { client, controller } = setup();
  await controller.start();
  client.failNext("listRepositories", new RegistryError("connection_failed", "refused"));
  const { lastFrame, unmount } = render(<App controller={controller} onFatal={() => undefined} />);

  await controller.dispatch("activate");

  const frame = await waitForFrame(lastFrame, / Error /);
  assert.match(frame, /regscope · connection_failed: refused/);
  assert.doesNotMatch(frame, /enter open/);
  unmount();
});

test("a long build step is wrapped in the detail pane and labelled in full width", async () => {
  const { controller } = setup();
  await controller.start();
  const { lastFrame, unmount } = render(<App controller={controller} onFatal={() => undefined} />);

  // team -> team/api -> 1.0 -> linux/amd64
  await controller.dispatch("move-down");
  for (let i = 0; i < 4; i += 1) await controller.dispatch("activate");

  const frame = await waitForFrame(lastFrame, /Step 1\/1/);
  assert.match(frame, /RUN apt-get update && \.\.\. +2 KiB/);
  assert.match(frame, /RUN apt-get update &&/);
  assert.match(frame, /apt-get install -y/);
  assert.match(frame, /curl && rm -rf/);
  assert.match(frame, /\/var\/lib\/apt\/lists\/\*/);
  unmount();
});

test("the JSON view scrolls and shows its position", async () => {
  const { controller } = setup();
  await controller.start();
  const { lastFrame, unmount } = render(<App controller={controller} onFatal={() => undefined} />);

  await controller.dispatch("move-down");
  for (let i = 0; i < 4; i += 1) await controller.dispatch("activate");
  await controller.dispatch("toggle-detail");
  await waitForFrame(lastFrame, /JSON 1-13\/\d+/);

  await controller.dispatch("scroll-detail-down");
  await waitForFrame(lastFrame, /JSON 2-14\/\d+/);
  unmount();
});

test("the help panel lists the shortcuts", async () => {
  const { controller } = setup();
  await controller.start();
  const { lastFrame, unmount } = render(<App controller={controller} onFatal={() => undefined} />);

  await controller.dispatch("toggle-help");

  const frame = await waitForFrame(lastFrame, /regscope shortcuts/);
  assert.match(frame, /toggle build step \/ raw JSON/);
  assert.match(frame, /scroll the detail pane/);
  unmount();
});
