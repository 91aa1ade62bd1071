process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.GROUP_CATALOG_ENABLED = 'false';
