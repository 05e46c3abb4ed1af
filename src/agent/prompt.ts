// System prompt template for the agent

export const DEFAULT_ROLE =
  'You are an expert AI coding assistant working from the command line. ' +
  'You help with writing code, debugging, explaining concepts and using the available tools. ' +
  'Be concise, accurate and proactive.';

/**
 * Facts about the host, supplied by the caller
 */
export interface EnvironmentInfo {
  os?: string;
  shell?: string;
  workingDirectory?: string;
  date?: string;
}

export interface RepositoryInfo {
  root?: string;
  branch?: string;
  language?: string;
  hasUncommittedChanges?: boolean;
}

function bulletSection(title: string, items: readonly string[]): string | undefined {
  if (items.length === 0) return undefined;
  return `## ${title}\n${items.map(item => `- ${item}`).join('\n')}`;
}

export class SystemPromptBuilder {
  private environment?: EnvironmentInfo;
  private repository?: RepositoryInfo;
  private toolInstructions: string[] = [];
  private guidelines: string[] = [];
  private preferences: string[] = [];

  constructor(private readonly role: string = DEFAULT_ROLE) {}

  withEnvironment(environment: EnvironmentInfo): this {
    this.environment = environment;
    return this;
  }

  withRepository(repository: RepositoryInfo): this {
    this.repository = repository;
    return this;
  }

  addToolInstruction(instruction: string): this {
    this.toolInstructions.push(instruction);
    return this;
  }

  addGuideline(guideline: string): this {
    this.guidelines.push(guideline);
    return this;
  }

  addPreference(preference: string): this {
    this.preferences.push(preference);
    return this;
  }

  /**
   * Full prompt: role, environment, repository, then bulleted sections
   */
  build(): string {
    const parts: string[] = [this.role];

    const env = this.environment;
    if (env) {
      const lines = [
        env.os && `- OS: ${env.os}`,
        env.shell && `- Shell: ${env.shell}`,
        env.workingDirectory && `- Working directory: ${env.workingDirectory}`,
        env.date && `- Date: ${env.date}`,
      ].filter((line): line is string => Boolean(line));
      if (lines.length > 0) parts.push(`## Environment\n${lines.join('\n')}`);
    }

    const repo = this.repository;
    if (repo) {
      const lines = [
        repo.root && `- Repository root: ${repo.root}`,
        repo.branch && `- Branch: ${repo.branch}`,
        repo.language && `- Primary language: ${repo.language}`,
        repo.hasUncommittedChanges ? '- Has uncommitted changes' : undefined,
      ].filter((line): line is string => Boolean(line));
      if (lines.length > 0) parts.push(`## Repository\n${lines.join('\n')}`);
    }

    for (const section of [
      bulletSection('Tool Usage', this.toolInstructions),
      bulletSection('Coding Guidelines', this.guidelines),
      bulletSection('Preferences', this.preferences),
    ]) {
      if (section) parts.push(section);
    }

    return parts.join('\n\n');
  }

  /**
   * Abbreviated prompt for when the budget is tight
   */
  buildShort(): string {
    const cwd = this.environment?.workingDirectory;
    return cwd ? `${this.role} Working directory: ${cwd}` : this.role;
  }
}
