/**
 * UserTest: a connectivity probe run by the user, timed independently of the feed
 */

export class UserTest {
  constructor(
    readonly pingMs: number,
    readonly speedBps: number,
    readonly savedAt: Date,
    public id: number | null = null
  ) {}

  sameResult(other: UserTest): boolean {
    return this.pingMs === other.pingMs && this.speedBps === other.speedBps;
  }
}
