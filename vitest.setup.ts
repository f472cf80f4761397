// Logging stays silent in tests unless a test sets LOG_LEVEL itself
process.env.NODE_ENV = 'test'
delete process.env.LOG_LEVEL
