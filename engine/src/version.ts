export const PROJECT_NAME = "apptrack";
export const PROJECT_VERSION = "0.3.0";

/** Sent with every HTTP request, e.g. "apptrack/0.3" */
export const USER_AGENT = `${PROJECT_NAME}/${PROJECT_VERSION.split(".").slice(0, 2).join(".")}`;
