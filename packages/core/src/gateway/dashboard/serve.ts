/** Auto-refresh interval bounds, in seconds. */
export const REFRESH_DEFAULT_SEC = 30;
export const REFRESH_MIN_SEC = 10;

/**
 * Single-page dashboard: KPIs, 24h trend sparklines, the last health
 * warnings, a report pane and the chat box with ChatOps buttons. Everything is inlined so the gateway serves
 * no static files; the script and style carry the per-request CSP nonce.
 */
export function renderDashboardHtml(nonce: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>OpsPulse</title>
  <style nonce="${nonce}">
    *, *::before, *::after { box-sizing: border-box; margin: 0; padding: 0; }
    body {
      font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Helvetica, Arial, sans-serif;
      background: #0f1724;
      color: #e4e7ec;
      padding: 24px;
    }
    header { display: flex; justify-content: space-between; align-items: center; margin-bottom: 20px; }
    header h1 { font-size: 20px; }
    .chip { font-size: 12px; color: #98a2b3; margin-left: 12px; }
    .grid { display: grid; grid-template-columns: repeat(4, 1fr); gap: 12px; margin-bottom: 16px; }
    .card { background: #17212f; border: 1px solid #253245; border-radius: 10px; padding: 14px; }
    .kpi { font-size: 28px; font-weight: 600; }
    .label { font-size: 12px; color: #98a2b3; text-transform: uppercase; letter-spacing: .04em; }
    .label.spaced { margin-top: 16px; }
    .columns { display: grid; grid-template-columns: 1fr 1fr; gap: 12px; }
    button {
      background: #253245; color: #e4e7ec; border: 1px solid #344054;
      border-radius: 999px; padding: 6px 12px; cursor: pointer; font-size: 13px;
    }
    button:hover { background: #344054; }
    button.primary { background: #2e90fa; border-color: #2e90fa; }
    ul.warnings { list-style: none; margin-top: 8px; font-size: 13px; }
    ul.warnings li { padding: 4px 0; border-bottom: 1px solid #253245; color: #fdb022; }
    pre { white-space: pre-wrap; font-size: 13px; line-height: 1.5; margin-top: 8px; max-height: 360px; overflow: auto; }
    #messages { height: 320px; overflow-y: auto; margin: 8px 0; display: flex; flex-direction: column; gap: 8px; }
    .msg { padding: 8px 12px; border-radius: 10px; white-space: pre-wrap; font-size: 14px; max-width: 90%; }
    .msg.user { align-self: flex-end; background: #2e90fa; }
    .msg.bot { align-self: flex-start; background: #253245; }
    .msg.error { align-self: flex-start; background: #7a271a; }
    .pills { display: flex; gap: 6px; flex-wrap: wrap; margin-top: 8px; }
    form { display: flex; gap: 8px; }
    .toolbar { display: flex; gap: 8px; align-items: center; flex-wrap: wrap; margin-bottom: 16px; }
    .toolbar input { flex: 0 0 72px; }
    .trends { display: grid; grid-template-columns: repeat(4, 1fr); gap: 12px; margin-bottom: 16px; }
    .trend-value { font-size: 18px; font-weight: 600; margin: 4px 0; }
    svg.spark { width: 100%; height: 48px; }
    svg.spark polyline { fill: none; stroke: #2e90fa; stroke-width: 2; }
    input { flex: 1; padding: 8px 12px; border-radius: 8px; border: 1px solid #344054; background: #0f1724; color: inherit; }
  </style>
</head>
<body>
  <header>
    <h1>OpsPulse</h1>
    <div><span class="chip" id="chipModel">Model: -</span><span class="chip" id="chipTime">-</span></div>
  </header>

  <section class="grid">
    <div class="card"><div class="label">Total checks</div><div class="kpi" id="kpiTotal">-</div></div>
    <div class="card"><div class="label">Healthy</div><div class="kpi" id="kpiHealthy">-</div></div>
    <div class="card"><div class="label">Warnings</div><div class="kpi" id="kpiWarnings">-</div></div>
    <div class="card"><div class="label">Status</div><div id="status">Ready</div></div>
  </section>

  <section class="toolbar">
    <button id="btnHealth">Run health check</button>
    <button id="btnMetrics">Refresh metrics</button>
    <button id="btnReport" class="primary">Generate report</button>
    <button id="btnAutoRefresh">Auto refresh: <span id="autoRefreshState">OFF</span></button>
    <label class="label" for="refreshInterval">Every (s)</label>
    <input id="refreshInterval" type="number" min="${REFRESH_MIN_SEC}" value="${REFRESH_DEFAULT_SEC}">
  </section>

  <section class="trends">
    <div class="card"><div class="label">CPU 24h</div><div class="trend-value" id="trendCpu">-</div><svg class="spark" id="sparkCpu" viewBox="0 0 240 48" preserveAspectRatio="none"></svg></div>
    <div class="card"><div class="label">Memory 24h</div><div class="trend-value" id="trendMemory">-</div><svg class="spark" id="sparkMemory" viewBox="0 0 240 48" preserveAspectRatio="none"></svg></div>
    <div class="card"><div class="label">Disk 24h</div><div class="trend-value" id="trendDisk">-</div><svg class="spark" id="sparkDisk" viewBox="0 0 240 48" preserveAspectRatio="none"></svg></div>
    <div class="card"><div class="label">Network 24h</div><div class="trend-value" id="trendNetio">-</div><svg class="spark" id="sparkNetio" viewBox="0 0 240 48" preserveAspectRatio="none"></svg></div>
  </section>

  <section class="columns">
    <div class="card">
      <div class="label">Warnings</div>
      <ul class="warnings" id="warnings"><li>No data yet</li></ul>
      <div class="label spaced">Report</div>
      <pre id="report">No report yet.</pre>
    </div>
    <div class="card">
      <div class="label">Chat</div>
      <div id="messages"></div>
      <form id="chatForm">
        <input id="chatInput" autocomplete="off" placeholder="Ask about your infrastructure...">
        <button class="primary" type="submit">Send</button>
      </form>
      <div class="pills">
        <button data-mode="health" data-text="Run a health check">Health</button>
        <button data-mode="metrics" data-text="Show the last 24h metrics">Metrics</button>
        <button data-mode="report" data-text="Write a report">Report</button>
        <button data-mode="daily_report" data-text="Write today's daily report">Daily report</button>
      </div>
    </div>
  </section>

  <script nonce="${nonce}">
    (function () {
      var sessionId = null;
      var lastHealth = null;
      var lastMetrics = null;
      var autoTimer = null;
      var SVG_NS = "http://www.w3.org/2000/svg";
      var $ = function (id) { return document.getElementById(id); };

      function setStatus(text) { $("status").textContent = text; }

      function addMessage(role, text) {
        var el = document.createElement("div");
        el.className = "msg " + role;
        el.textContent = text;
        $("messages").appendChild(el);
        $("messages").scrollTop = $("messages").scrollHeight;
      }

      function renderHealth(health) {
        lastHealth = health;
        $("kpiTotal").textContent = health.summary.total;
        $("kpiHealthy").textContent = health.summary.healthy;
        $("kpiWarnings").textContent = health.summary.warnings;
        $("chipTime").textContent = new Date(health.timestamp).toLocaleString();
        var list = $("warnings");
        list.replaceChildren();
        var items = health.warnings.length ? health.warnings : ["No alerts"];
        items.forEach(function (w) {
          var li = document.createElement("li");
          li.textContent = w;
          list.appendChild(li);
        });
      }

      function renderSpark(svgId, valueId, series) {
        var svg = $(svgId);
        svg.replaceChildren();
        if (!series || !series.length) { $(valueId).textContent = "-"; return; }
        var step = series.length > 1 ? 240 / (series.length - 1) : 0;
        var points = series.map(function (p, i) {
          var v = Math.max(0, Math.min(100, Number(p.v) || 0));
          return (i * step).toFixed(1) + "," + (48 - (v / 100) * 48).toFixed(1);
        });
        var line = document.createElementNS(SVG_NS, "polyline");
        line.setAttribute("points", points.join(" "));
        svg.appendChild(line);
        $(valueId).textContent = Number(series[series.length - 1].v).toFixed(1) + "%";
      }

      function renderMetrics(metrics) {
        lastMetrics = metrics;
        renderSpark("sparkCpu", "trendCpu", metrics.cpu);
        renderSpark("sparkMemory", "trendMemory", metrics.memory);
        renderSpark("sparkDisk", "trendDisk", metrics.disk);
        renderSpark("sparkNetio", "trendNetio", metrics.netio);
      }

      async function api(path, method, body) {
        var res = await fetch(path, {
          method: method || "GET",
          headers: body ? { "Content-Type": "application/json" } : undefined,
          body: body ? JSON.stringify(body) : undefined
        });
        var json = await res.json();
        if (!json.ok) throw new Error(json.error ? json.error.message : "API error (" + res.status + ")");
        return json;
      }

      async function send(text, mode) {
        addMessage("user", text);
        setStatus("Thinking...");
        try {
          var out = await api("/api/chat", "POST", { input: text, mode: mode, sessionId: sessionId || undefined });
          sessionId = out.sessionId;
          if (out.health) renderHealth(out.health);
          if (out.metrics) renderMetrics(out.metrics);
          if (out.reportMarkdown != null) $("report").textContent = out.reportMarkdown || "No content returned.";
          if (out.usedModel) $("chipModel").textContent = "Model: " + out.usedModel;
          addMessage("bot", out.text);
          setStatus("Ready");
        } catch (err) {
          addMessage("error", String(err.message || err));
          setStatus("Error");
        }
      }

      $("chatForm").addEventListener("submit", function (event) {
        event.preventDefault();
        var text = $("chatInput").value.trim();
        if (!text) return;
        $("chatInput").value = "";
        send(text, "auto");
      });

      document.querySelectorAll("button[data-mode]").forEach(function (btn) {
        btn.addEventListener("click", function () {
          send(btn.getAttribute("data-text"), btn.getAttribute("data-mode"));
        });
      });

      async function runStep(label, fn) {
        setStatus(label + "...");
        try {
          await fn();
          setStatus("Ready");
        } catch (err) {
          setStatus(label + " failed: " + String(err.message || err));
        }
      }

      function loadHealth() {
        return runStep("Health check", async function () {
          renderHealth((await api("/api/healthcheck")).data);
        });
      }

      function loadMetrics() {
        return runStep("Loading metrics", async function () {
          renderMetrics((await api("/api/metrics")).data);
        });
      }

      function generateReport() {
        return runStep("Generating report", async function () {
          var out = await api("/api/report", "POST", {
            health: lastHealth || undefined,
            metrics: lastMetrics || undefined
          });
          $("report").textContent = out.reportMarkdown || "No content returned.";
          if (out.usedModel) $("chipModel").textContent = "Model: " + out.usedModel;
        });
      }

      async function runCycle() {
        await loadHealth();
        await loadMetrics();
      }

      function intervalMs() {
        var seconds = parseInt($("refreshInterval").value || "${REFRESH_DEFAULT_SEC}", 10);
        if (isNaN(seconds)) seconds = ${REFRESH_DEFAULT_SEC};
        return Math.max(${REFRESH_MIN_SEC}, seconds) * 1000;
      }

      $("btnHealth").addEventListener("click", loadHealth);
      $("btnMetrics").addEventListener("click", loadMetrics);
      $("btnReport").addEventListener("click", generateReport);

      $("btnAutoRefresh").addEventListener("click", function () {
        if (autoTimer) {
          clearInterval(autoTimer);
          autoTimer = null;
          $("autoRefreshState").textContent = "OFF";
          return;
        }
        $("autoRefreshState").textContent = "ON";
        runCycle();
        autoTimer = setInterval(runCycle, intervalMs());
      });

      $("refreshInterval").addEventListener("change", function () {
        if (!autoTimer) return;
        clearInterval(autoTimer);
        autoTimer = setInterval(runCycle, intervalMs());
      });

      runCycle();
    })();
  </script>
</body>
</html>`;
}
