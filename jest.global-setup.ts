// Run the suite in a zone with daylight saving so UTC formatting is checked
// against a local offset that changes during the year
export default async function globalSetup(): Promise<void> {
  process.env.TZ = 'America/New_York';
}
