import "dotenv/config";
import express from "express";
import cors from "cors";
import { createCompareRouter } from "./api/compare.js";
import { describeConfig, loadProviderConfig } from "./backend/services/providerConfig.js";

const config = loadProviderConfig();
console.log("[config] providers:", describeConfig(config));

const app = express();

app.use(cors());
app.use(express.json());

app.use("/", createCompareRouter({ config }));

const port = Number(process.env.PORT) || 3000;
app.listen(port, () => {
  console.log(`Backend running on port ${port}`);
});
