import { simpleGit, SimpleGit } from 'simple-git';

export class GitOperations {
  private git: SimpleGit;

  constructor(repoPath: string) {
    this.git = simpleGit(repoPath);
  }

  /**
   * Fetch URL of the named remote, or null outside a repository or when the
   * remote is not configured.
   */
  async getRemoteUrl(name = 'origin'): Promise<string | null> {
    if (!(await this.git.checkIsRepo())) {
      return null;
    }

    const remotes = await this.git.getRemotes(true);
    const remote = remotes.find((r) => r.name === name);
    return remote?.refs.fetch || null;
  }
}
