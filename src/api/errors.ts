export class RiceXProError extends Error {
  public readonly status: number | undefined;
  public readonly isUserFriendly: boolean;

  constructor(message: string, status?: number, isUserFriendly: boolean = false) {
    super(message);
    this.name = 'RiceXProError';
    this.status = status;
    this.isUserFriendly = isUserFriendly;
  }
}

/**
 * The browser could not do what the search flow asked of it: a missing
 * field, button or chart attribute, or a failed navigation.
 */
export class DriverError extends RiceXProError {
  constructor(message: string) {
    super(message, undefined, true);
    this.name = 'DriverError';
  }
}

export class FetchError extends RiceXProError {
  public readonly url: string;

  constructor(message: string, url: string, status?: number) {
    super(message, status, true);
    this.name = 'FetchError';
    this.url = url;
  }
}

export class DecodeError extends RiceXProError {
  public readonly url: string | undefined;

  constructor(message: string, url?: string) {
    super(message, undefined, true);
    this.name = 'DecodeError';
    this.url = url;
  }
}

export class ValidationError extends RiceXProError {
  constructor(message: string) {
    super(message, undefined, true);
    this.name = 'ValidationError';
  }
}
