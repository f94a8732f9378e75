import assert from "node:assert/strict";
import test from "node:test";
import { BrowserController } from "../controller.js";
import { InvariantError, RegistryError } from "../errors.js";
import { describeDetail } from "../helpers/detail.js";
import { highlightedRow, populatedPanes } from "../helpers/state.js";
import type { BrowserCommand, BrowserState } from "../types.js";
import { FakeRegistryClient, LINUX_ARM64, layer, platformImage, step } from "./fixtures.js";

const REGISTRY_URL = "https://registry.example.test";

function setup(): { client: FakeRegistryClient; controller: BrowserController } {
  const client = new FakeRegistryClient({
    tags: {
      "team/api": ["1.0", "latest"],
      "team/web": ["2.0"],
      alpine: ["3.20"],
      "team/broken": ["bad"],
    },
    images: {
      "team/api:1.0": [
        platformImage({
          platform: LINUX_ARM64,
          history: [step("ADD rootfs.tar /"), step("ENV PATH=/bin", true)],
          layers: [layer("aa", 512)],
        }),
        platformImage({ seed: "bb" }),
      ],
      "team/broken:bad": [platformImage({ history: [step("RUN one")], layers: [] })],
    },
  });
  return { client, controller: new BrowserController({ client, registryUrl: REGISTRY_URL }) };
}

async function run(controller: BrowserController, commands: readonly BrowserCommand[]): Promise<void> {
  for (const command of commands) await controller.dispatch(command);
}

test("start opens the namespaces menu", async () => {
  const { controller } = setup();
  const states: BrowserState[] = [];
  controller.subscribe((state) => states.push(state));

  await controller.start();

  const state = controller.getState();
  assert.deepEqual(populatedPanes(state), ["namespaces"]);
  assert.deepEqual(
    state.panes.namespaces.menu?.items.map((row) => row.key),
    ["library", "team"],
  );
  assert.deepEqual(
    states.map((entry) => entry.status.text),
    [`Loading ${REGISTRY_URL}…`, "Ready"],
  );
});

test("activation drills down to the build steps of a platform image", async () => {
  const { controller } = setup();
  await controller.start();
  // team -> team/api -> 1.0 -> linux/arm64/v8
  await run(controller, ["move-down", "activate", "activate", "activate", "activate"]);

  const state = controller.getState();
  assert.equal(state.focus, "layers");
  assert.deepEqual(populatedPanes(state), ["namespaces", "repositories", "tags", "platforms", "layers"]);
  assert.equal(state.panes.platforms.menu?.heading, "team/api - 1.0");
  assert.equal(state.panes.layers.menu?.heading, "linux/arm64/v8");
  assert.deepEqual(describeDetail(state), { title: "Step 1/2", body: "ADD rootfs.tar /", tone: "normal" });

  await controller.dispatch("activate");
  assert.equal(controller.getState(), state);
});

test("revisiting an entry reuses its cached menu", async () => {
  const { client, controller } = setup();
  await controller.start();
  await run(controller, ["move-down", "activate", "activate", "activate"]);
  const platforms = controller.getState().panes.platforms.menu;

  await run(controller, ["back", "activate"]);

  assert.equal(controller.getState().panes.platforms.menu, platforms);
  assert.equal(client.count("getImage team/api:1.0"), 1);
});

test("refresh rebuilds the highlighted entry", async () => {
  const { client, controller } = setup();
  await controller.start();
  await run(controller, ["move-down", "activate", "activate", "activate", "back", "refresh"]);

  assert.equal(client.count("getImage team/api:1.0"), 2);
  assert.equal(controller.getState().focus, "platforms");
});

test("a registry failure is shown and browsing continues", async () => {
  const { client, controller } = setup();
  await controller.start();
  await run(controller, ["move-down", "activate"]);
  client.failNext("listTags", RegistryError.fromStatus(404, "GET /v2/team/api/tags/list failed"));

  await controller.dispatch("activate");

  const failed = controller.getState();
  assert.equal(failed.focus, "repositories");
  assert.deepEqual(populatedPanes(failed), ["namespaces", "repositories"]);
  assert.equal(failed.error, "not_found (HTTP 404): GET /v2/team/api/tags/list failed");
  assert.equal(describeDetail(failed).tone, "error");

  await controller.dispatch("activate");
  assert.equal(controller.getState().error, null);
  assert.equal(controller.getState().focus, "tags");
});

test("a failed root can be refreshed from the empty namespaces pane", async () => {
  const { client, controller } = setup();
  client.failNext("listNamespaces", new RegistryError("connection_failed", "connect ECONNREFUSED"));

  await controller.start();
  assert.equal(controller.getState().error, "connection_failed: connect ECONNREFUSED");

  await controller.dispatch("refresh");
  assert.equal(controller.getState().error, null);
  assert.equal(client.count("listNamespaces"), 2);
});

test("inconsistent image data rejects the command", async () => {
  const { controller } = setup();
  await controller.start();
  // team -> team/broken -> bad, then open linux/amd64
  await run(controller, ["move-down", "activate", "move-down", "activate", "activate"]);

  await assert.rejects(controller.dispatch("activate"), InvariantError);

  await controller.dispatch("back");
  assert.equal(controller.getState().focus, "tags");
});

test("page and jump commands move by the configured page size", async () => {
  const { controller } = setup();
  await controller.start();
  await run(controller, ["move-down", "activate"]);
  assert.deepEqual(
    controller.getState().panes.repositories.menu?.items.map((row) => row.key),
    ["team/api", "team/broken", "team/web"],
  );

  controller.setPageRows(2);
  await controller.dispatch("page-down");
  assert.equal(highlightedRow(controller.getState())?.key, "team/web");
  await controller.dispatch("page-up");
  assert.equal(controller.getState().panes.repositories.cursor, 0);
  await controller.dispatch("last");
  assert.equal(controller.getState().panes.repositories.cursor, 2);
  await controller.dispatch("first");
  assert.equal(controller.getState().panes.repositories.cursor, 0);
});

test("detail scrolling stops once the last wrapped line is visible", async () => {
  const client = new FakeRegistryClient({
    tags: { "team/api": ["1.0"] },
    images: {
      "team/api:1.0": [
        platformImage({
          history: [step("RUN apt-get update && apt-get install -y curl && rm -rf /var/lib/apt/lists/*")],
        }),
      ],
    },
  });
  const controller = new BrowserController({ client, registryUrl: REGISTRY_URL });
  await controller.start();
  await run(controller, ["activate", "activate", "activate", "activate"]);
  assert.equal(controller.getState().focus, "layers");

  // Four lines at width 21, two of them visible.
  controller.setDetailViewport(21, 2);
  await run(controller, ["scroll-detail-down", "scroll-detail-down", "scroll-detail-down"]);
  assert.equal(controller.getState().detailScroll, 2);
  await controller.dispatch("scroll-detail-up");
  assert.equal(controller.getState().detailScroll, 1);

  await controller.dispatch("toggle-detail");
  assert.equal(controller.getState().detailScroll, 0);
});

test("listeners stop receiving state after unsubscribing", async () => {
  const { controller } = setup();
  let calls = 0;
  const unsubscribe = controller.subscribe(() => {
    calls += 1;
  });
  await controller.start();
  const afterStart = calls;

  unsubscribe();
  await controller.dispatch("toggle-detail");

  assert.equal(afterStart, 2);
  assert.equal(calls, 2);
  assert.equal(controller.getState().detailMode, "json");
});
