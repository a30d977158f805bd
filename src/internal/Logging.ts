import _ = require("lodash");
import async = require("async");
import winston = require("winston");
import TransportStream = require("winston-transport");
import {IPluginChoice} from "../public/api/IPipelineDefinition";
import {ILogPlugin} from "../public/plugins/ILogPlugin";
import {ILogPluginParams} from "../public/options/logging/ILogPluginParams";
import {ELogLevel} from "../public/options/logging/ELogLevel";
import {ConfigError} from "../public/errors/ConfigError";
import {ErrorUtil} from "../public/utils/ErrorUtil";
import {Plugins} from "./Plugins";

export interface ILoggerOptions {
    label: string;
    workingDir: string;
    outDir: string;
}

/**
 * Creates a logger whose transports come from the chosen log plugins. A console transport is always attached, with
 * the default options unless the choices configure one.
 */
export function createLogger(choices: ReadonlyArray<IPluginChoice>,
                             options: ILoggerOptions,
                             callback: async.AsyncResultCallback<winston.Logger, Error>): void {
    const transports: TransportStream[] = [];
    let consoleLoggerAttached: boolean = false;

    const fns: async.AsyncFunction<void, Error>[] = [];

    for (const choice of choices) {
        const logPlugin: ILogPlugin | undefined = Plugins.log[choice.name];
        if (!logPlugin) {
            callback(new ConfigError("There is no log plugin called " + choice.name + ". Known plugins: " +
                _.keys(Plugins.log).join(", ")));
            return;
        }

        if (choice.options === false) {
            // `console: false` turns the default console transport off
            consoleLoggerAttached = consoleLoggerAttached || choice.name === "console";
            continue;
        }

        fns.push((innerCallback: async.ErrorCallback<Error>) => {
            runLogPlugin(logPlugin, choice.options, options, transports, innerCallback);
        });

        if (choice.name === "console") {
            consoleLoggerAttached = true;
        }
    }

    // we always want to attach a console logger
    if (!consoleLoggerAttached && Plugins.log["console"]) {
        const consolePlugin: ILogPlugin = Plugins.log["console"];
        fns.push((innerCallback: async.ErrorCallback<Error>) => {
            runLogPlugin(consolePlugin, {level: ELogLevel.info}, options, transports, innerCallback);
        });
    }

    async.series(fns, (err?: Error | null) => {
        if (err) {
            callback(ErrorUtil.customize(err, "An error occurred while creating the logger " + options.label));
            return;
        }

        // no defaultMeta: it would replace the label of child loggers; each transport falls back to options.label
        callback(null, winston.createLogger({
            level: ELogLevel.silly,
            transports: transports
        }));
    });
}

function runLogPlugin(logPlugin: ILogPlugin,
                      pluginOptions: unknown,
                      options: ILoggerOptions,
                      transports: TransportStream[],
                      callback: async.ErrorCallback<Error>): void {
    const params: ILogPluginParams = {
        options: pluginOptions,
        label: options.label,
        workingDir: options.workingDir,
        outDir: options.outDir
    };

    try {
        logPlugin(params, (err?: Error | null, result?: TransportStream[]) => {
            if (err) {
                callback(err);
                return;
            }

            _.forEach(result, (transport: TransportStream) => {
                transports.push(transport);
            });
            callback(null);
        });
    } catch (e) {
        callback(ErrorUtil.toError(e));
    }
}
