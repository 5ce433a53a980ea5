#!/usr/bin/env node
import CommunicationEnvironment from "./CommunicationEnvironment"
import ParseArgvAndRunMission   from "./ParseArgvAndRunMission"
import * as source_map_support  from "source-map-support"

source_map_support.install();

const com = new CommunicationEnvironment( process.stdout, process.stderr );
new ParseArgvAndRunMission( com, process.cwd(), process.stdout.columns || 100 ).run( process.argv.slice( 1 ), code => {
    process.exitCode = code;
} );
