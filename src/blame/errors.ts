export class GraphBuildError extends Error {
  packageName: string;

  constructor(packageName: string, message: string) {
    super(`${packageName}: ${message}`);
    this.name = 'GraphBuildError';
    this.packageName = packageName;
  }
}
