import assert from "node:assert/strict";
import test from "node:test";
import { LAYER_PANE_MIN_WIDTH, browserLayout } from "../helpers/layout.js";

test("the layers pane never gets narrower than a full label and its size", () => {
  assert.equal(LAYER_PANE_MIN_WIDTH, 40);
  assert.deepEqual(browserLayout(24, 100), {
    bodyHeight: 23,
    paneHeight: 7,
    pageRows: 3,
    lowerHeight: 16,
    layerWidth: 40,
    detailWidth: 21,
    detailRows: 13,
  });
});

test("wide terminals cap the layers pane and give the rest to the detail pane", () => {
  const layout = browserLayout(50, 200);
  assert.equal(layout.layerWidth, 54);
  assert.equal(layout.detailWidth, 107);
  assert.equal(layout.detailRows, 39);
  assert.equal(layout.pageRows, 12);
});
