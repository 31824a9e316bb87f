import pino from "pino";

const logger = pino({
  name: "delivery-dispatch",
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === "test" ? "silent" : "info"),
});

export default logger;
