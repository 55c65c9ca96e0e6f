import type Docker from "dockerode";

interface PullStream {
  image: string;
  status: string;
}

/**
 * In-process stand-in for the dockerode image calls the container backend
 * makes: pull with progress, dangling image listing, image removal.
 */
export class FakeDocker {
  /** Images passed to `pull`, in call order. */
  readonly pulls: string[] = [];
  /** `filters` of every `listImages` call. */
  readonly imageQueries: unknown[] = [];
  /** Ids removed through `getImage(id).remove()`. */
  readonly removed: string[] = [];

  private readonly upToDate = new Set<string>();
  private readonly pullFailures = new Map<string, string>();
  private readonly dangling = new Map<string, string[]>();
  private readonly removalFailures = new Map<string, string>();

  readonly modem = {
    followProgress: (stream: PullStream, onFinished: (err: Error | null, output: unknown[]) => void): void => {
      onFinished(null, [{ status: `Pulling from ${stream.image}` }, { status: stream.status }]);
    },
  };

  /** Report the image as already current on its next pull. */
  current(image: string): this {
    this.upToDate.add(image);
    return this;
  }

  failPull(image: string, message: string): this {
    this.pullFailures.set(image, message);
    return this;
  }

  /** Dangling image ids listed for a repository filter. */
  danglingFor(repository: string, ...ids: string[]): this {
    this.dangling.set(repository, ids);
    return this;
  }

  failRemoval(id: string, message: string): this {
    this.removalFailures.set(id, message);
    return this;
  }

  async pull(image: string): Promise<PullStream> {
    this.pulls.push(image);
    const failure = this.pullFailures.get(image);
    if (failure !== undefined) throw new Error(failure);
    const status = this.upToDate.has(image)
      ? `Status: Image is up to date for ${image}`
      : `Status: Downloaded newer image for ${image}`;
    return { image, status };
  }

  async listImages(options: { filters: { reference?: string[] } }): Promise<Array<{ Id: string; RepoTags: null }>> {
    this.imageQueries.push(options.filters);
    const repository = options.filters.reference?.[0] ?? "";
    return (this.dangling.get(repository) ?? []).map(Id => ({ Id, RepoTags: null }));
  }

  getImage(id: string): { remove: (options: { force: boolean }) => Promise<void> } {
    return {
      remove: async () => {
        const failure = this.removalFailures.get(id);
        if (failure !== undefined) throw new Error(failure);
        this.removed.push(id);
      },
    };
  }

  asDocker(): Docker {
    return this as unknown as Docker;
  }
}
