export interface AccessTokenProps {
  value: string;
  /** Lifetime in seconds, as granted by the token endpoint. */
  expiresIn: number;
  /** Epoch milliseconds at which the token was received. */
  issuedAt: number;
}

export class AccessToken {
  private constructor(private readonly props: AccessTokenProps) {
    if (!props.value || props.value.trim().length === 0) {
      throw new Error("AccessToken value cannot be empty");
    }
    if (!Number.isFinite(props.expiresIn) || props.expiresIn < 0) {
      throw new Error("AccessToken expiresIn must be a non-negative number");
    }
  }

  public static issue(value: string, expiresIn: number, issuedAt: number = Date.now()): AccessToken {
    return new AccessToken({ value, expiresIn, issuedAt });
  }

  public get value(): string {
    return this.props.value;
  }

  public get expiresIn(): number {
    return this.props.expiresIn;
  }

  public get issuedAt(): number {
    return this.props.issuedAt;
  }

  public get expiresAt(): number {
    return this.props.issuedAt + this.props.expiresIn * 1000;
  }

  public isExpired(now: number = Date.now()): boolean {
    return now > this.expiresAt;
  }

  public toJSON(): AccessTokenProps {
    return { ...this.props };
  }
}
