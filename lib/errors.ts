/** The job page could not be retrieved (network error, non-2xx status, timeout). */
export class FetchFailureError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(message);
    this.name = "FetchFailureError";
    this.url = url;
    this.status = status;
  }
}

export class InvalidStatusTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Cannot move analysis from "${from}" to "${to}"`);
    this.name = "InvalidStatusTransitionError";
  }
}

export class DuplicateSkillError extends Error {
  readonly title: string;

  constructor(title: string) {
    super(`Skill "${title}" already exists`);
    this.name = "DuplicateSkillError";
    this.title = title;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
