export class InvariantViolation extends Error {
  readonly _tag = "InvariantViolation" as const;

  constructor(readonly messageText: string) {
    super(messageText);
    this.name = "InvariantViolation";
  }
}

export const invariant: (condition: boolean, message: string) => asserts condition = (
  condition,
  message,
) => {
  if (!condition) {
    throw new InvariantViolation(message);
  }
};
