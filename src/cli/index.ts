#!/usr/bin/env node
import { runCampaignCommand } from "./campaign.js";

process.exitCode = await runCampaignCommand(process.argv.slice(2));
