#!/usr/bin/env node

import { defineCommand, runMain } from "citty"

import { address } from "./address"
import { start } from "./start"

const main = defineCommand({
  meta: {
    name: "onion-gateway",
    description:
      "Serve a site over a Tor onion service and a public endpoint, keeping arti supervised",
  },
  subCommands: { serve: start, address },
})

void runMain(main)
