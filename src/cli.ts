#!/usr/bin/env node
import {main} from './core';
import {Logger} from './utils';

main(process.argv.slice(2), process.env).then(
    code => {
        process.exitCode = code;
    },
    (error: unknown) => {
        Logger.getInstance().error('Unexpected failure', error);
        process.exitCode = 1;
    }
);
