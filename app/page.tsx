'use client';

import { useEffect, useMemo, useState } from 'react';

type OutputFormatId = 'webp' | 'jpeg' | 'png';

type Diagnostics = {
  productFound: boolean;
  segmentationMode: string;
  polarity: string | null;
  productSize: { width: number; height: number } | null;
  placement: { x: number; y: number; width: number; height: number };
  encodedBytes: number;
  quality: number | null;
  encodeAttempts: number;
  sizeTargetMet: boolean | null;
  aiRemoval: string;
  aiFallbackReason: string | null;
  upscalePasses: number;
};

type ProcessOutput = {
  url: string;
  format: OutputFormatId;
  diagnostics: Diagnostics | null;
};

const FORMATS: { id: OutputFormatId; name: string }[] = [
  { id: 'jpeg', name: 'JPEG' },
  { id: 'webp', name: 'WebP' },
  { id: 'png', name: 'PNG' }
];

function parseDiagnostics(header: string | null): Diagnostics | null {
  if (!header) return null;
  try {
    return JSON.parse(header);
  } catch {
    return null;
  }
}

export default function Page() {
  const [file, setFile] = useState<File | null>(null);
  const [outputFormat, setOutputFormat] = useState<OutputFormatId>('jpeg');
  const [backgroundColor, setBackgroundColor] = useState('#F3F3F3');
  const [targetMaxKb, setTargetMaxKb] = useState('');
  const [aiBackgroundRemoval, setAiBackgroundRemoval] = useState(false);
  const [busy, setBusy] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [result, setResult] = useState<ProcessOutput | null>(null);

  const previewUrl = useMemo(() => (file ? URL.createObjectURL(file) : null), [file]);

  useEffect(() => {
    return () => {
      if (result) URL.revokeObjectURL(result.url);
    };
  }, [result]);

  async function handleProcess() {
    if (!file) {
      setError('Select an image first.');
      return;
    }

    setBusy(true);
    setError(null);

    try {
      const config: Record<string, unknown> = { outputFormat, backgroundColor, aiBackgroundRemoval };
      const kb = Number(targetMaxKb);
      if (targetMaxKb.trim() && Number.isFinite(kb) && kb > 0) {
        config.targetMaxKb = kb;
      }

      const formData = new FormData();
      formData.append('image', file);
      formData.append('config', JSON.stringify(config));

      const res = await fetch('/api/process', {
        method: 'POST',
        body: formData
      });

      if (!res.ok) {
        const json: { message?: string } = await res.json();
        throw new Error(json.message || 'Processing failed');
      }

      const blob = await res.blob();
      setResult({
        url: URL.createObjectURL(blob),
        format: outputFormat,
        diagnostics: parseDiagnostics(res.headers.get('X-Processing-Diagnostics'))
      });
    } catch (e) {
      const message = e instanceof Error ? e.message : 'Processing failed';
      setError(message);
    } finally {
      setBusy(false);
    }
  }

  function handleDownload() {
    if (!result) return;
    const link = document.createElement('a');
    link.href = result.url;
    link.download = `processed.${result.format === 'jpeg' ? 'jpg' : result.format}`;
    link.click();
  }

  const diagnostics = result?.diagnostics;

  return (
    <main className="shell">
      <section className="panel">
        <h1>Product Canvas</h1>
        <p className="lead">Upload a product photo to cut it out, centre it and place it on a clean square canvas.</p>

        <div className="controls">
          <label className="field">
            <span>Image</span>
            <input
              type="file"
              accept="image/png,image/jpeg,image/jpg,image/webp,image/bmp,image/tiff"
              onChange={(e) => setFile(e.target.files?.[0] ?? null)}
            />
          </label>

          <label className="field">
            <span>Format</span>
            <select
              value={outputFormat}
              onChange={(e) => setOutputFormat(FORMATS.find((f) => f.id === e.target.value)?.id ?? 'jpeg')}
            >
              {FORMATS.map((format) => (
                <option key={format.id} value={format.id}>
                  {format.name}
                </option>
              ))}
            </select>
          </label>

          <label className="field">
            <span>Background</span>
            <input type="text" value={backgroundColor} onChange={(e) => setBackgroundColor(e.target.value)} />
          </label>

          <label className="field">
            <span>Max size (KB)</span>
            <input type="number" min={1} value={targetMaxKb} onChange={(e) => setTargetMaxKb(e.target.value)} />
          </label>

          <label className="field checkbox">
            <input
              type="checkbox"
              checked={aiBackgroundRemoval}
              onChange={(e) => setAiBackgroundRemoval(e.target.checked)}
            />
            <span>AI background removal</span>
          </label>

          <button className="run" type="button" onClick={handleProcess} disabled={busy}>
            {busy ? 'Processing...' : 'Process'}
          </button>
        </div>

        {error ? <p className="error">{error}</p> : null}
      </section>

      <section className="grid">
        <article className="card">
          <h2>Input</h2>
          {previewUrl ? <img src={previewUrl} alt="Input preview" /> : <div className="empty">No image selected.</div>}
        </article>

        <article className="card">
          <h2>Output</h2>
          {result ? (
            <>
              <img src={result.url} alt="Output preview" />
              <button className="download" type="button" onClick={handleDownload}>
                Download
              </button>
            </>
          ) : (
            <div className="empty">No output yet.</div>
          )}
        </article>
      </section>

      <section className="panel metrics">
        <h2>Diagnostics</h2>
        {diagnostics ? (
          <ul>
            <li>Product found: {diagnostics.productFound ? 'yes' : 'no'}</li>
            <li>
              Segmentation: {diagnostics.segmentationMode}
              {diagnostics.polarity ? ` (${diagnostics.polarity} background)` : ''}
            </li>
            {diagnostics.productSize ? (
              <li>
                Product box: {diagnostics.productSize.width} x {diagnostics.productSize.height}
              </li>
            ) : null}
            <li>
              Placement: {diagnostics.placement.width} x {diagnostics.placement.height} at ({diagnostics.placement.x},{' '}
              {diagnostics.placement.y})
            </li>
            <li>Encoded size: {(diagnostics.encodedBytes / 1024).toFixed(1)} KB</li>
            <li>
              Quality: {diagnostics.quality ?? 'lossless'} after {diagnostics.encodeAttempts} attempt(s)
            </li>
            {diagnostics.sizeTargetMet !== null ? (
              <li>Size target met: {diagnostics.sizeTargetMet ? 'yes' : 'no'}</li>
            ) : null}
            <li>
              AI removal: {diagnostics.aiRemoval}
              {diagnostics.aiFallbackReason ? ` (${diagnostics.aiFallbackReason})` : ''}
            </li>
            <li>Upscale passes: {diagnostics.upscalePasses}</li>
          </ul>
        ) : (
          <p className="empty">Process an image to inspect the pipeline diagnostics.</p>
        )}
      </section>
    </main>
  );
}
