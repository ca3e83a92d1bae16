import test from "node:test";
import assert from "node:assert/strict";
import { renderCodingPage } from "../src/routes/site.js";

test("coding page reports failed navigation requests in the notice area", () => {
  const html = renderCodingPage();
  assert.match(
    html,
    /async function navigate\(body\) \{\s+try \{[\s\S]*?\} catch \(error\) \{\s+showNotice\(error\.message, "bad"\);/
  );
});

test("coding page wraps label mutations the same way", () => {
  const html = renderCodingPage();
  assert.match(
    html,
    /async function mutate\(method, path, body\) \{\s+try \{[\s\S]*?\} catch \(error\) \{\s+showNotice\(error\.message, "bad"\);/
  );
});
