export class BundleParseError extends Error {
  constructor(detail: string) {
    super(`Unable to parse Bundle: ${detail}`);
    this.name = 'BundleParseError';
  }
}

export class ResourceParseError extends Error {
  readonly resourceType: string;

  constructor(resourceType: string, detail: string) {
    super(`Unable to parse ${resourceType}: ${detail}`);
    this.name = 'ResourceParseError';
    this.resourceType = resourceType;
  }
}
