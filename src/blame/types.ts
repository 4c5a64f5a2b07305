export type PackageRecord = {
  name: string;
  ownSize: number; // bytes
  dependencyGroups: string[][]; // each group lists alternatives (OR)
};

export type BlameState = { kind: 'pending'; size: number } | { kind: 'collapsed' };

export type PackageNode = {
  name: string;
  ownSize: number;
  blame: BlameState;
  depChildren: ReadonlySet<string>;
  depParents: ReadonlySet<string>;
};

export type PackageGraph = Map<string, PackageNode>;

export type BlameStats = {
  visits: number;
  cutoffs: number;
  collapsed: number;
  droppedBytes: number;
  stranded: string[];
  strandedBytes: number;
};

export type RankedPackage = {
  name: string;
  sizeBytes: number;
};

export function attributedSize(node: PackageNode): number | null {
  return node.blame.kind === 'pending' ? node.blame.size : null;
}
