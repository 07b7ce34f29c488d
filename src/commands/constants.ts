/** Positional argument naming the database file or URL. */
export const ARG_DATABASE = "database" as const;

/** Positional argument holding SQL or a dot command to run before exiting. */
export const ARG_SQL = "sql" as const;

/** Environment variable name for the database file or connection URL. */
export const ENV_DATABASE_URL = "SQLSH_DATABASE_URL";

/** Environment variable name for the remote database auth token. */
export const ENV_AUTH_TOKEN = "SQLSH_AUTH_TOKEN";
