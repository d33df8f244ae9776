import type { PolicyRule } from "../policy/rules";
import { esc } from "./html";

type OpenApiParameter = {
  name: string;
  in: "path";
  required: true;
  schema: { type: "string" };
};

function pathParameters(pattern: string): OpenApiParameter[] {
  return [...pattern.matchAll(/\{([^}]+)\}/g)].map((match) => ({
    name: match[1],
    in: "path",
    required: true,
    schema: { type: "string" },
  }));
}

/** OpenAPI document listing exactly the allowlisted operations. */
export function buildOpenApiDocument(rules: readonly PolicyRule[], version: string): Record<string, unknown> {
  const paths: Record<string, Record<string, unknown>> = {};
  for (const rule of rules) {
    const entry = paths[rule.pattern] ?? {};
    entry[rule.method.toLowerCase()] = {
      summary: rule.summary,
      parameters: pathParameters(rule.pattern),
      security: [{ bearerAuth: [] }],
      responses: {
        "200": { description: "Backend response" },
        "403": { description: "Operation not allowed or rejected by the operator" },
        "502": { description: "Backend unavailable or not authenticated" },
      },
    };
    paths[rule.pattern] = entry;
  }

  return {
    openapi: "3.0.3",
    info: { title: "Mail and calendar gateway", version },
    paths,
    components: {
      securitySchemes: { bearerAuth: { type: "http", scheme: "bearer" } },
    },
  };
}

export function renderDocsPage(rules: readonly PolicyRule[], version: string): string {
  const rows = rules
    .map(
      (rule) =>
        `<tr><td><code>${esc(rule.method)}</code></td><td><code>${esc(rule.pattern)}</code></td><td>${esc(rule.summary)}</td></tr>`
    )
    .join("\n");

  return `<!doctype html><html><head><meta charset="utf-8" /><title>Gateway operations</title></head><body>
<h1>Gateway operations <small>v${esc(version)}</small></h1>
<p>Every request needs <code>Authorization: Bearer &lt;api key&gt;</code>. Anything not listed is denied. Machine-readable form: <a href="/openapi.json">/openapi.json</a>.</p>
<table>
<thead><tr><th align="left">Method</th><th align="left">Path</th><th align="left">Operation</th></tr></thead>
<tbody>
${rows}
</tbody>
</table>
</body></html>`;
}
