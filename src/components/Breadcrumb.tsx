import { posix } from "node:path";

interface Props {
  path: string;
}

/** Ancestors of `path`, each linking to a scan of that directory. */
export function Breadcrumb({ path }: Props) {
  const parts = ancestors(path);
  if (parts.length === 0) return null;

  return (
    <nav className="breadcrumb">
      {parts.map((part, i) => (
        <span key={part.path}>
          {i > 0 && <span className="breadcrumb-sep">&rsaquo;</span>}
          {i < parts.length - 1 ? (
            <a className="breadcrumb-btn" href={`/?path=${encodeURIComponent(part.path)}`}>
              {part.name}
            </a>
          ) : (
            <span className="breadcrumb-current">{part.name}</span>
          )}
        </span>
      ))}
    </nav>
  );
}

export function ancestors(path: string): { name: string; path: string }[] {
  const normalised = posix.normalize(path);
  if (!normalised.startsWith("/")) return [{ name: normalised, path: normalised }];

  const result = [{ name: "/", path: "/" }];
  let current = "";
  for (const segment of normalised.split("/")) {
    if (!segment) continue;
    current += "/" + segment;
    result.push({ name: segment, path: current });
  }
  return result;
}
