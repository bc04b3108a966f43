export class JoystickNotFoundError extends Error {
  constructor(message = "No joystick found. Please connect a controller.") {
    super(message);
    this.name = "JoystickNotFoundError";
  }
}

export class JoystickOpenError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to open joystick ${path}: ${reason}`, { cause });
    this.name = "JoystickOpenError";
    this.path = path;
  }
}
