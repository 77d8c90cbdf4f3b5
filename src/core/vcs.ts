import { simpleGit } from 'simple-git';

export interface VcsInitializer {
  init(projectDir: string): Promise<void>;
}

/** Initializes a git repository with the generated tree staged. */
export const gitInitializer: VcsInitializer = {
  async init(projectDir) {
    const git = simpleGit(projectDir);
    await git.init();
    await git.add('.');
  },
};
