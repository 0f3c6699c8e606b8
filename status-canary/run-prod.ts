#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { ProdActions } from './actions';
import { exitFailure, runOnce } from './cli';
import { type Config, loadConfig } from './config';
import { errorToString } from './errors';

// one monitoring pass, meant to be invoked by cron or similar:
//     $ node run-prod.js

// variables already in the environment win over .env
dotenv.config();

function main(): Promise<number> {
	let config: Config;
	try {
		config = loadConfig(process.env);
	} catch (err) {
		// tslint:disable-next-line:no-console
		console.error(errorToString(err));
		return Promise.resolve(exitFailure);
	}

	return runOnce(
		{ notificationDestination: config.notificationTopicArn },
		new ProdActions(config),
	);
}

main().then(
	(exitCode) => {
		process.exitCode = exitCode;
	},
	(err: unknown) => {
		// tslint:disable-next-line:no-console
		console.error(errorToString(err));
		process.exitCode = exitFailure;
	},
);
