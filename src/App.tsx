import { ScanForm } from "./components/ScanForm";
import { Treemap } from "./components/Treemap";
import { Legend } from "./components/Legend";
import { Breadcrumb } from "./components/Breadcrumb";
import { formatBytes } from "./lib/format";
import type { NodeAttributes } from "./lib/nodeAttributes";

export interface ScanResult {
  path: string;
  totalSize: number;
  nodes: NodeAttributes[];
  width: number;
  height: number;
}

interface Props {
  mutation: number;
  seed?: number;
  result: ScanResult | null;
  error: string | null;
}

export function App({ mutation, seed, result, error }: Props) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>treemap-tint</title>
      </head>
      <body>
        <div className="app">
          <header className="app-header">
            <h1>treemap-tint</h1>
            <ScanForm path={result?.path ?? ""} mutation={mutation} seed={seed} />
            {result && <Legend nodes={result.nodes} />}
          </header>
          <main className="app-main">
            {error && <div className="status error">Error: {error}</div>}
            {result && (
              <div className="treemap-container">
                <div className="treemap-header">
                  <Breadcrumb path={result.path} />
                  <span className="treemap-total">Total: {formatBytes(result.totalSize)}</span>
                </div>
                <Treemap nodes={result.nodes} width={result.width} height={result.height} />
              </div>
            )}
            {!result && !error && (
              <div className="status">Enter a directory path and click Scan</div>
            )}
          </main>
        </div>
      </body>
    </html>
  );
}
