/** An external check (shell script check, version script) could not complete. */
export class CheckError extends Error {
  constructor(message: string, readonly output = '') {
    super(message);
    this.name = 'CheckError';
  }
}
