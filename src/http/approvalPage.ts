import type { PendingSnapshot } from "../confirmation/webQueue";
import { esc } from "./html";

function contextRows(entry: PendingSnapshot): string[] {
  const rows: Array<[string, string | undefined]> = [
    ["Query", Object.entries(entry.queryParams).map(([key, value]) => `${key}=${value}`).join("&") || undefined],
    ["Subject", entry.messageSubject],
    ["From", entry.messageFrom],
    ["Preview", entry.messageSnippet],
    ["Add labels", entry.labelsToAdd?.join(", ")],
    ["Remove labels", entry.labelsToRemove?.join(", ")],
    ["Event", entry.eventSummary],
    ["Attendees", entry.eventAttendees?.join(", ")],
    ["Send notifications", entry.sendUpdates],
  ];
  return rows
    .filter((row): row is [string, string] => Boolean(row[1]))
    .map(([label, value]) => `<tr><th align="left">${esc(label)}</th><td>${esc(value)}</td></tr>`);
}

export function renderPendingCard(entry: PendingSnapshot): string {
  return `<section class="card" data-id="${esc(entry.id)}">
  <h2><code>${esc(entry.method)}</code> ${esc(entry.path)}</h2>
  <p class="meta">Requested ${esc(entry.createdAt)}</p>
  <table>${contextRows(entry).join("")}</table>
  <button data-action="approve" data-id="${esc(entry.id)}">Approve</button>
  <button data-action="reject" data-id="${esc(entry.id)}">Reject</button>
</section>`;
}

/** Operator page: the current queue rendered server-side, then kept live over SSE. */
export function renderApprovalPage(pending: PendingSnapshot[]): string {
  const cards = pending.length ? pending.map((entry) => renderPendingCard(entry)).join("\n") : `<p class="empty">No pending requests.</p>`;

  return `<!doctype html>
<html>
  <head>
    <meta charset="utf-8" />
    <title>Gateway approvals</title>
    <style>
      body { font-family: system-ui, sans-serif; margin: 2rem; max-width: 56rem; }
      .card { border: 1px solid #ccc; border-radius: 6px; padding: 1rem; margin-bottom: 1rem; }
      .meta { color: #666; font-size: 0.85rem; }
      th { padding-right: 1rem; vertical-align: top; }
      button { margin-right: 0.5rem; }
    </style>
  </head>
  <body>
    <h1>Pending approvals <span id="status" class="meta">connecting</span></h1>
    <div id="queue">${cards}</div>
    <script>
      const queue = document.getElementById("queue");
      const status = document.getElementById("status");
      const esc = (value) => String(value ?? "").replace(/[&<>"]/g, (c) => ({ "&": "&amp;", "<": "&lt;", ">": "&gt;", '"': "&quot;" })[c]);
      const rows = (entry) => [
        ["Query", Object.entries(entry.queryParams || {}).map(([k, v]) => k + "=" + v).join("&")],
        ["Subject", entry.messageSubject],
        ["From", entry.messageFrom],
        ["Preview", entry.messageSnippet],
        ["Add labels", (entry.labelsToAdd || []).join(", ")],
        ["Remove labels", (entry.labelsToRemove || []).join(", ")],
        ["Event", entry.eventSummary],
        ["Attendees", (entry.eventAttendees || []).join(", ")],
        ["Send notifications", entry.sendUpdates],
      ].filter((row) => row[1]).map((row) => "<tr><th align=\\"left\\">" + esc(row[0]) + "</th><td>" + esc(row[1]) + "</td></tr>").join("");
      const render = (pending) => {
        queue.innerHTML = pending.length
          ? pending.map((entry) =>
              "<section class=\\"card\\"><h2><code>" + esc(entry.method) + "</code> " + esc(entry.path) + "</h2>" +
              "<p class=\\"meta\\">Requested " + esc(entry.createdAt) + "</p><table>" + rows(entry) + "</table>" +
              "<button data-action=\\"approve\\" data-id=\\"" + esc(entry.id) + "\\">Approve</button>" +
              "<button data-action=\\"reject\\" data-id=\\"" + esc(entry.id) + "\\">Reject</button></section>").join("")
          : "<p class=\\"empty\\">No pending requests.</p>";
      };
      queue.addEventListener("click", async (event) => {
        const button = event.target.closest("button[data-action]");
        if (!button) return;
        button.disabled = true;
        await fetch("/approval/api/" + encodeURIComponent(button.dataset.id) + "/" + button.dataset.action, { method: "POST" });
      });
      const source = new EventSource("/approval/api/events");
      source.onopen = () => { status.textContent = "live"; };
      source.onerror = () => { status.textContent = "reconnecting"; };
      source.onmessage = (message) => render(JSON.parse(message.data).pending);
    </script>
  </body>
</html>`;
}
