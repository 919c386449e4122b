import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

// Imported first by the entry point so monitoring and logging see .env values.
dotenvExpand.expand(dotenv.config());
