export class CustodyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CustodyError';
  }
}
