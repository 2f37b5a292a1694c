import { DependencyMissingError } from "../domain/errors";

export function assertDependency(name: string): void {
  try {
    require.resolve(name);
  } catch {
    throw new DependencyMissingError(
      name,
      `${name} is required to apply YAML updates. Install it with \`npm install ${name}\`.`,
    );
  }
}
