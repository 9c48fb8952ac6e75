interface Props {
  path: string;
  mutation: number;
  seed?: number;
}

export function ScanForm({ path, mutation, seed }: Props) {
  return (
    <form className="scan-form" method="get" action="/">
      <input
        type="text"
        name="path"
        defaultValue={path}
        placeholder="Enter absolute path..."
      />
      <input
        type="number"
        name="mutation"
        min={0}
        max={1}
        step={0.05}
        defaultValue={mutation}
        title="Colour mutation"
      />
      <input type="number" name="seed" defaultValue={seed} placeholder="Seed" />
      <button type="submit">Scan</button>
    </form>
  );
}
