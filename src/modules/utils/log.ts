export function logStep(ticker: string, operation: string, result: string): void {
  console.log(`${ticker} ${operation} ${result}`);
}
