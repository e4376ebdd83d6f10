// ---------------------------------------------------------------------------
// Browser front-end served at `/`.
// ---------------------------------------------------------------------------

import { escapeXml } from "../charts/svg.js";

export interface HomePageOptions {
  modelId: string;
  labels: readonly string[];
  /** Sidebar trivia line; the box is hidden when null. */
  didYouKnow: string | null;
}

export function renderHomePage(options: HomePageOptions): string {
  const tip = options.didYouKnow
    ? `<div class="tip"><div class="tipHead">Did you know?</div>${escapeXml(options.didYouKnow)}</div>`
    : "";
  const categories = options.labels.map((label) => `<span class="pill">${escapeXml(label)}</span>`).join(" ");

  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>EcoSort</title>
    <style>
      :root {
        --bg: #f3f6f7;
        --panel: #ffffff;
        --side: #148f77;
        --text: #1c2833;
        --muted: #5d6d7e;
        --line: #d5dbdb;
        --accent: #16a085;
        --danger: #c0392b;
        --download: #e67e22;
        --sans: ui-sans-serif, system-ui, -apple-system, Segoe UI, Roboto, Helvetica, Arial, sans-serif;
      }

      html, body { margin: 0; height: 100%; background: var(--bg); color: var(--text); font-family: var(--sans); }
      .layout { display: grid; grid-template-columns: 240px 1fr; min-height: 100%; }
      aside { background: var(--side); color: #fff; padding: 20px 16px; display: flex; flex-direction: column; gap: 14px; }
      aside h1 { margin: 0; font-size: 24px; }
      nav { display: grid; gap: 6px; }
      nav button { text-align: left; background: rgba(255,255,255,0.08); color: #fff; border: 1px solid rgba(255,255,255,0.2); border-radius: 8px; padding: 10px 12px; cursor: pointer; font-size: 14px; }
      nav button.active { background: rgba(255,255,255,0.24); font-weight: 650; }
      .tip { margin-top: auto; background: rgba(255,255,255,0.12); border-radius: 10px; padding: 12px; font-size: 13px; line-height: 1.4; }
      .tipHead { font-weight: 700; margin-bottom: 6px; }

      main { padding: 28px; max-width: 1100px; }
      .view { display: none; }
      .view.active { display: block; }
      .card { background: var(--panel); border: 1px solid var(--line); border-radius: 12px; padding: 18px; margin-bottom: 16px; }
      .sub { color: var(--muted); font-size: 14px; }
      .pill { display: inline-block; font-size: 12px; border: 1px solid var(--line); border-radius: 999px; padding: 4px 10px; margin: 2px; color: var(--muted); }

      form { display: flex; gap: 10px; align-items: center; flex-wrap: wrap; }
      button.primary { background: var(--accent); color: #fff; border: none; border-radius: 8px; padding: 10px 16px; font-weight: 650; cursor: pointer; }
      button.download { background: var(--download); color: #fff; border: none; border-radius: 8px; padding: 10px 16px; font-weight: 650; cursor: pointer; }
      button:disabled { opacity: 0.6; cursor: not-allowed; }
      .err { color: var(--danger); font-size: 14px; white-space: pre-wrap; margin-top: 10px; display: none; }

      .preview { max-width: 100%; max-height: 380px; border-radius: 10px; border: 1px solid var(--line); }
      .progress { height: 12px; background: #e5e8e8; border-radius: 999px; overflow: hidden; margin: 10px 0 16px; }
      .progress > div { height: 100%; background: var(--accent); width: 0; }
      .grid { display: grid; grid-template-columns: 1fr 1fr; gap: 16px; }
      .fact h3 { margin: 14px 0 4px; font-size: 15px; }
      .fact p { margin: 0; }
      .chart svg { max-width: 100%; height: auto; }

      @media (max-width: 820px) {
        .layout { grid-template-columns: 1fr; }
        .grid { grid-template-columns: 1fr; }
      }
    </style>
  </head>
  <body>
    <div class="layout">
      <aside>
        <h1>EcoSort</h1>
        <nav>
          <button type="button" data-view="home" class="active">Home</button>
          <button type="button" data-view="upload">Upload Image</button>
          <button type="button" data-view="about">About Project</button>
        </nav>
        ${tip}
      </aside>

      <main>
        <section id="view-home" class="view active">
          <div class="card">
            <h2>Welcome to EcoSort</h2>
            <p class="sub">Photo-based waste classification and recycling assistant</p>
            <p>EcoSort identifies the material of a waste item from a photo and gives recycling
              guidelines, environmental impact figures and disposal tips.</p>
          </div>
        </section>

        <section id="view-upload" class="view">
          <div class="card">
            <h2>Upload Waste Image</h2>
            <form id="form">
              <input id="file" type="file" accept="image/jpeg,image/png,image/bmp,image/webp" />
              <button id="go" class="primary" type="submit">Classify</button>
            </form>
            <div id="error" class="err"></div>
          </div>

          <div id="result" style="display:none;">
            <div class="card">
              <div class="grid">
                <div><img id="preview" class="preview" alt="Uploaded image" /></div>
                <div>
                  <h2 id="headline"></h2>
                  <div class="progress"><div id="bar"></div></div>
                  <div class="sub" id="stamp"></div>
                </div>
              </div>
            </div>
            <div class="card chart" id="confidenceChart"></div>
            <div class="card">
              <div class="grid">
                <div class="fact">
                  <h3>Description</h3><p id="f-description"></p>
                  <h3>How to Recycle</h3><p id="f-recycle"></p>
                  <h3>Hazard Level</h3><p id="f-hazard"></p>
                </div>
                <div class="fact">
                  <h3>Decomposition Time</h3><p id="f-time"></p>
                  <h3>Eco Tip</h3><p id="f-tip"></p>
                  <h3>Carbon saving / Landfill reduction</h3><p id="f-metrics"></p>
                </div>
              </div>
            </div>
            <div class="card">
              <h3>Recyclability</h3>
              <div class="chart" id="recyclabilityChart"></div>
            </div>
            <button id="download" class="download" type="button">Download Report (PDF)</button>
          </div>
        </section>

        <section id="view-about" class="view">
          <div class="card">
            <h2>About EcoSort</h2>
            <p>EcoSort runs a pretrained image classifier (<code>${escapeXml(options.modelId)}</code>)
              over each upload and joins its prediction with a table of recycling guidance.
              It can also produce a one-page PDF report.</p>
            <p class="sub">Categories:</p>
            <div>${categories}</div>
          </div>
        </section>
      </main>
    </div>

    <script>
      const views = ['home', 'upload', 'about'];
      const navButtons = document.querySelectorAll('nav button');
      const form = document.getElementById('form');
      const fileEl = document.getElementById('file');
      const goBtn = document.getElementById('go');
      const errorEl = document.getElementById('error');
      const resultEl = document.getElementById('result');
      const downloadBtn = document.getElementById('download');
      let lastFile = null;

      function show(view) {
        for (const v of views) {
          document.getElementById('view-' + v).classList.toggle('active', v === view);
        }
        navButtons.forEach((b) => b.classList.toggle('active', b.dataset.view === view));
      }

      function showError(text) {
        errorEl.style.display = 'block';
        errorEl.textContent = text;
      }

      function clearError() {
        errorEl.style.display = 'none';
        errorEl.textContent = '';
      }

      function setText(id, text) {
        document.getElementById(id).textContent = text;
      }

      function render(data, file) {
        const report = data.report;
        const p = report.prediction;
        const confidence = p.confidence.toFixed(2);
        setText('headline', 'Predicted: ' + p.label.toUpperCase() + ' (' + confidence + '%)');
        document.getElementById('bar').style.width = Math.round(p.confidence) + '%';
        setText('stamp', 'Last analyzed: ' + new Date().toLocaleString());
        document.getElementById('preview').src = URL.createObjectURL(file);
        document.getElementById('confidenceChart').innerHTML = data.charts.confidence;
        document.getElementById('recyclabilityChart').innerHTML = data.charts.recyclability;
        setText('f-description', report.facts.description);
        setText('f-recycle', report.facts.recycle);
        setText('f-hazard', report.facts.hazard);
        setText('f-time', report.facts.decompositionTime);
        setText('f-tip', report.facts.tip);
        setText('f-metrics', report.facts.carbonSaving + ' / ' + report.facts.landfillReduction);
        resultEl.style.display = 'block';
      }

      async function post(path, file) {
        const body = new FormData();
        body.append('image', file);
        const resp = await fetch(path, { method: 'POST', body });
        if (!resp.ok) {
          let message = 'HTTP ' + resp.status;
          try {
            const data = await resp.json();
            if (data && data.error) message = data.error;
          } catch {}
          throw new Error(message);
        }
        return resp;
      }

      form.addEventListener('submit', async (e) => {
        e.preventDefault();
        clearError();
        resultEl.style.display = 'none';
        const file = fileEl.files && fileEl.files[0];
        if (!file) {
          showError('Choose an image first.');
          return;
        }
        goBtn.disabled = true;
        goBtn.textContent = 'Analyzing...';
        try {
          const resp = await post('/classify', file);
          lastFile = file;
          render(await resp.json(), file);
        } catch (err) {
          showError('Failed to predict: ' + (err && err.message ? err.message : err));
        } finally {
          goBtn.disabled = false;
          goBtn.textContent = 'Classify';
        }
      });

      downloadBtn.addEventListener('click', async () => {
        if (!lastFile) return;
        downloadBtn.disabled = true;
        try {
          const resp = await post('/report', lastFile);
          const url = URL.createObjectURL(await resp.blob());
          const a = document.createElement('a');
          a.href = url;
          a.download = 'EcoSort_Report.pdf';
          a.click();
          URL.revokeObjectURL(url);
        } catch (err) {
          showError('Failed to build report: ' + (err && err.message ? err.message : err));
        } finally {
          downloadBtn.disabled = false;
        }
      });

      navButtons.forEach((b) => b.addEventListener('click', () => show(b.dataset.view)));
    </script>
  </body>
</html>`;
}
