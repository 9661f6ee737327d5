// Silences console logging and keeps .env out of test runs.
process.env.NODE_ENV = 'test';
