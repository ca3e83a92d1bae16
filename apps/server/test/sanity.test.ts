import { test } from "node:test";
import assert from "node:assert/strict";
import { contextLabelName, groupLabelName, isContextLabel, isGroupLabel } from "../src/types/coding.js";

test("groupLabelName maps every group code", () => {
  assert.equal(groupLabelName(0), "Infographic");
  assert.equal(groupLabelName(1), "Solo");
  assert.equal(groupLabelName(2), "Small group");
  assert.equal(groupLabelName(3), "Crowd");
});

test("contextLabelName maps newscast and congress", () => {
  assert.equal(contextLabelName(1), "Newscast");
  assert.equal(contextLabelName(2), "Congress");
});

test("isGroupLabel rejects codes outside 0..3", () => {
  assert.equal(isGroupLabel(3), true);
  assert.equal(isGroupLabel(4), false);
  assert.equal(isGroupLabel("1"), false);
  assert.equal(isGroupLabel(null), false);
});

test("isContextLabel rejects 0", () => {
  assert.equal(isContextLabel(0), false);
  assert.equal(isContextLabel(2), true);
});
