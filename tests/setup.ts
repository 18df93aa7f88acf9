// Global test setup - runs before every test file
// Keeps log output quiet and points the default database at memory

if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}
if (!process.env.DATABASE_FILE) {
  process.env.DATABASE_FILE = ':memory:';
}
