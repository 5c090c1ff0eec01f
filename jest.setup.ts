process.env.LOG_LEVEL = "silent";
delete process.env.LOG_FILE;
