import { Router } from "express";

export const siteRouter = Router();

siteRouter.get("/", (_req, res) => {
  res.type("html").send(renderCodingPage());
});

export function renderCodingPage(): string {
  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>Image Coding Tool</title>
    <style>
      :root {
        --ink: #1d2430;
        --muted: #5d6776;
        --line: #d9dee6;
        --accent: #2f6fd6;
        --ok: #1e7a46;
        --warn: #9a6a00;
        --bad: #b3261e;
      }
      * { box-sizing: border-box; }
      body {
        margin: 0;
        font-family: "Segoe UI", "Helvetica Neue", sans-serif;
        color: var(--ink);
        background: #f5f7fa;
      }
      .wrap { max-width: 1100px; margin: 0 auto; padding: 20px; }
      h1 { margin: 0 0 8px; font-size: 1.8rem; }
      h2 { font-size: 1.15rem; margin: 18px 0 8px; }
      details { background: #fff; border: 1px solid var(--line); border-radius: 10px; padding: 10px 14px; }
      .row { display: flex; flex-wrap: wrap; gap: 10px; align-items: center; }
      .spacer { flex: 1; }
      .bar { height: 10px; background: var(--line); border-radius: 999px; overflow: hidden; min-width: 240px; flex: 1; }
      .bar > span { display: block; height: 100%; background: var(--accent); width: 0; }
      button {
        min-height: 40px;
        padding: 8px 14px;
        border-radius: 8px;
        border: 1px solid var(--line);
        background: #fff;
        font-weight: 600;
        cursor: pointer;
      }
      button.primary { background: var(--accent); border-color: var(--accent); color: #fff; }
      button:disabled { opacity: 0.45; cursor: default; }
      .viewer { margin: 14px 0; text-align: center; background: #fff; border: 1px solid var(--line); border-radius: 10px; padding: 12px; }
      .viewer img { max-width: 100%; max-height: 60vh; }
      .notice { padding: 10px 12px; border-radius: 8px; margin: 8px 0; background: #eef3fb; }
      .notice.ok { background: #e7f5ec; color: var(--ok); }
      .notice.warn { background: #fff4dc; color: var(--warn); }
      .notice.bad { background: #fdeceb; color: var(--bad); }
      .grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(240px, 1fr)); gap: 12px; }
      ul { margin: 4px 0; padding-left: 20px; }
      input[type="number"] { width: 100px; min-height: 40px; border-radius: 8px; border: 1px solid var(--line); padding: 0 8px; }
    </style>
  </head>
  <body>
    <main class="wrap">
      <h1>Image Coding Tool</h1>
      <details>
        <summary><strong>Instructions</strong></summary>
        <p>Please categorize each image based on the number of people visible:</p>
        <ul>
          <li><strong>0 = No people</strong>: No human figures visible or 50%+ text.</li>
          <li><strong>1 = Solo</strong>: One person is focus.</li>
          <li><strong>2 = Small group</strong>: Multiple people all presented as equal.</li>
          <li><strong>3 = Crowd</strong>: No focal person, or a focal person attempting to appear as the central person in a crowd.</li>
        </ul>
        <p>Additionally, if applicable, mark the context (select only one):</p>
        <ul>
          <li><strong>Newscast</strong>: Image appears to be from a television news broadcast (not CSPAN).</li>
          <li><strong>Congress</strong>: Image appears to be taken in a congressional setting or CSPAN.</li>
        </ul>
        <p>If you're unsure, make a selection, but note the filename and your confusion in a separate document.</p>
      </details>

      <section class="row" style="margin-top: 14px">
        <div class="bar"><span id="bar"></span></div>
        <span id="progressText"></span>
        <button id="prevBtn">Previous</button>
        <button id="nextBtn">Next</button>
      </section>

      <details style="margin-top: 10px">
        <summary>Jump to specific image</summary>
        <div class="row" style="margin-top: 8px">
          <label>Go to image number: <input id="jumpInput" type="number" min="1" value="1" /></label>
          <button id="jumpBtn">Go</button>
          <button id="nextUncodedBtn">Go to next uncoded</button>
        </div>
      </details>

      <div id="notice"></div>

      <h2 id="itemTitle"></h2>
      <div id="itemFilename"></div>
      <div class="viewer" id="viewer"></div>

      <h2>Select the appropriate category</h2>
      <div class="row" id="groupButtons"></div>
      <div id="groupStatus"></div>

      <h2>Context (if applicable)</h2>
      <div class="row" id="contextButtons"></div>
      <div id="contextStatus"></div>

      <div class="row" style="margin-top: 12px">
        <button id="clearBtn">Clear all selections</button>
        <span class="spacer"></span>
        <button id="advanceBtn" class="primary">Next Image</button>
      </div>

      <h2>Summary</h2>
      <div class="grid">
        <div><strong>People Categories:</strong><ul id="groupSummary"></ul></div>
        <div><strong>Context Categories:</strong><ul id="contextSummary"></ul></div>
      </div>

      <div id="exportStatus"></div>
      <div class="row">
        <button id="exportBtn" class="primary">Export Final Results</button>
        <a href="/api/export/partial"><button type="button">Download Partial Results</button></a>
        <a href="/api/export/backup"><button type="button">Download Progress Backup</button></a>
      </div>
    </main>

    <script>
      let view = null;

      function esc(value) {
        return String(value ?? "")
          .replace(/&/g, "&amp;")
          .replace(/</g, "&lt;")
          .replace(/>/g, "&gt;")
          .replace(/"/g, "&quot;");
      }

      function showNotice(message, tone) {
        document.getElementById("notice").innerHTML = message
          ? '<div class="notice ' + (tone || "") + '">' + esc(message) + "</div>"
          : "";
      }

      async function api(method, path, body) {
        const response = await fetch(path, {
          method,
          headers: { "Content-Type": "application/json" },
          body: body === undefined ? undefined : JSON.stringify(body)
        });
        const payload = await response.json().catch(() => ({}));
        if (!response.ok) {
          const detail = typeof payload.detail === "string" ? payload.detail : JSON.stringify(payload.error);
          throw new Error(detail || "request_failed");
        }
        return payload;
      }

      async function refresh() {
        render(await api("GET", "/api/session"));
      }

      async function navigate(body) {
        try {
          const next = await api("POST", "/api/session/navigate", body);
          render(next);
          showNotice(next.notice || "", "warn");
        } catch (error) {
          showNotice(error.message, "bad");
        }
      }

      async function mutate(method, path, body) {
        try {
          await api(method, path, body);
          showNotice("");
          await refresh();
        } catch (error) {
          showNotice(error.message, "bad");
        }
      }

      function renderImage(index) {
        const viewer = document.getElementById("viewer");
        viewer.innerHTML = "";
        const img = document.createElement("img");
        img.alt = "Image " + (index + 1);
        img.src = "/api/items/" + index + "/image";
        img.onerror = async () => {
          const response = await fetch(img.src).catch(() => null);
          const payload = response ? await response.json().catch(() => ({})) : {};
          viewer.innerHTML = '<div class="notice bad">' + esc(payload.detail || "Error loading image") + "</div>";
        };
        viewer.appendChild(img);
      }

      function render(next) {
        const imageChanged = !view || view.currentIndex !== next.currentIndex;
        view = next;
        const index = view.currentIndex;

        document.getElementById("bar").style.width = (view.progress * 100).toFixed(1) + "%";
        document.getElementById("progressText").textContent =
          "Progress: " + view.codedCount + "/" + view.total + " images coded (" + (view.progress * 100).toFixed(1) + "%)";
        document.getElementById("prevBtn").disabled = index === 0;
        document.getElementById("nextBtn").disabled = index >= view.total - 1;
        const jumpInput = document.getElementById("jumpInput");
        jumpInput.max = String(view.total);
        jumpInput.value = String(index + 1);

        document.getElementById("itemTitle").textContent = "Image " + (index + 1) + " of " + view.total;
        document.getElementById("itemFilename").innerHTML = "<strong>Filename:</strong> " + esc(view.item.basename);
        if (imageChanged) renderImage(index);

        const groups = document.getElementById("groupButtons");
        groups.innerHTML = Object.entries(view.categories.groups)
          .map(([code, name]) => {
            const active = view.labels.groupLabel === Number(code) ? "primary" : "";
            return '<button class="' + active + '" data-group="' + code + '">' + code + ": " + esc(name) + "</button>";
          })
          .join("");
        document.getElementById("groupStatus").innerHTML =
          view.labels.groupLabel === null
            ? '<div class="notice">No category selected yet</div>'
            : '<div class="notice ok">Current selection: ' + view.labels.groupLabel + " - " + esc(view.labels.groupLabelName) + "</div>";

        const contexts = document.getElementById("contextButtons");
        contexts.innerHTML = Object.entries(view.categories.contexts)
          .map(([code, name]) => {
            const active = view.labels.context === Number(code) ? "primary" : "";
            return '<button class="' + active + '" data-context="' + code + '">' + esc(name) + "</button>";
          })
          .join("");
        document.getElementById("contextStatus").innerHTML =
          view.labels.context === null
            ? '<div class="notice">No context selected</div>'
            : '<div class="notice ok">Context: ' + esc(view.labels.contextName) + "</div>";

        document.getElementById("clearBtn").style.display =
          view.labels.groupLabel !== null || view.labels.context !== null ? "" : "none";
        document.getElementById("advanceBtn").style.display = view.labels.groupLabel !== null ? "" : "none";

        document.getElementById("groupSummary").innerHTML = view.summary.groups.length
          ? view.summary.groups.map((entry) => "<li>" + esc(entry.name) + ": " + entry.count + " images</li>").join("")
          : "<li>No images coded yet</li>";
        document.getElementById("contextSummary").innerHTML = view.summary.contexts.length
          ? view.summary.contexts.map((entry) => "<li>" + esc(entry.name) + ": " + entry.count + " images</li>").join("")
          : "<li>No context labels assigned</li>";

        document.getElementById("exportBtn").disabled = !view.summary.exportReady;
        document.getElementById("exportStatus").innerHTML = view.summary.exportReady
          ? '<div class="notice ok">All images have been coded!</div>'
          : '<div class="notice">Complete coding all ' + view.total + " images to export final results.</div>";
      }

      document.getElementById("groupButtons").addEventListener("click", (event) => {
        const code = event.target.closest("button")?.dataset.group;
        if (code === undefined || !view) return;
        void mutate("PUT", "/api/items/" + view.currentIndex + "/group", { code: Number(code) });
      });
      document.getElementById("contextButtons").addEventListener("click", (event) => {
        const code = event.target.closest("button")?.dataset.context;
        if (code === undefined || !view) return;
        void mutate("POST", "/api/items/" + view.currentIndex + "/context", { code: Number(code) });
      });
      document.getElementById("clearBtn").addEventListener("click", () => {
        if (view) void mutate("DELETE", "/api/items/" + view.currentIndex + "/labels");
      });
      document.getElementById("prevBtn").addEventListener("click", () => void navigate({ action: "previous" }));
      document.getElementById("nextBtn").addEventListener("click", () => void navigate({ action: "next" }));
      document.getElementById("advanceBtn").addEventListener("click", () => void navigate({ action: "next" }));
      document.getElementById("nextUncodedBtn").addEventListener("click", () => void navigate({ action: "next_uncoded" }));
      document.getElementById("jumpBtn").addEventListener("click", () => {
        const value = Number(document.getElementById("jumpInput").value);
        if (Number.isInteger(value)) void navigate({ action: "goto", index: value - 1 });
      });
      document.getElementById("exportBtn").addEventListener("click", async () => {
        try {
          const result = await api("POST", "/api/export/final");
          showNotice("Results saved to " + result.path, "ok");
        } catch (error) {
          showNotice(error.message, "warn");
        }
      });

      refresh().catch((error) => showNotice(error.message, "bad"));
    </script>
  </body>
</html>`;
}
