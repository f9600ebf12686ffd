import { Project, ts } from 'ts-morph';

// Creating a Project is expensive, so one in-memory instance is reused for
// every request. Each request adds its own source file and removes it after.
let sharedProject: Project | null = null;

export function getSharedProject(): Project {
  if (!sharedProject) {
    sharedProject = new Project({
      useInMemoryFileSystem: true,
      skipFileDependencyResolution: true, // Imports are read syntactically, never resolved
      compilerOptions: {
        target: ts.ScriptTarget.ES2022,
        allowJs: true,
        noLib: true, // Only syntactic diagnostics are requested
        types: [],
        skipLibCheck: true,
      },
    });
  }
  return sharedProject;
}

/**
 * Reset the shared project. Intended for test teardown. The next
 * getSharedProject() call creates a fresh instance.
 */
export function resetSharedProject(): void {
  sharedProject = null;
}
