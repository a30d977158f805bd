import _ = require("lodash");
import async = require("async");
import {Plugins} from "./Plugins";
import {IPluginRegistry} from "../public/plugins/PluginType";
import {IPluginIndex} from "../public/plugins/IPluginIndex";
import {ConfigError} from "../public/errors/ConfigError";
import {ErrorUtil} from "../public/utils/ErrorUtil";
import logConsole = require("../plugins/jobline-log-console/index");
import logFiles = require("../plugins/jobline-log-files/index");
import checkoutLocal = require("../plugins/jobline-checkout-local/index");
import checkoutGit = require("../plugins/jobline-checkout-git/index");
import reportFile = require("../plugins/jobline-report-file/index");
import reportCommand = require("../plugins/jobline-report-command/index");

/**
 * Plugin manager allows you to add plugins to extend the functionality of jobline.
 */
export class PluginManager {

    /**
     * A plugin module is the NPM package that contains one or more jobline plugins.
     */
    static pluginModules: _.Dictionary<boolean> = {};

    /**
     * A jobline plugin supplies log transports, a checkout provider or a report sink.
     */
    static plugins: IPluginRegistry = Plugins;

    private static alreadyInitialized: boolean = false;

    /**
     * Adds the plugins that come with jobline. These are plugins you don't have to list in the `plugins` section.
     */
    static initDefault(): void {
        if (this.alreadyInitialized) {
            return;
        }

        this.alreadyInitialized = true;

        PluginManager.pluginModules["jobline-log-console"] = true;
        logConsole.default(PluginManager.plugins);

        PluginManager.pluginModules["jobline-log-files"] = true;
        logFiles.default(PluginManager.plugins);

        PluginManager.pluginModules["jobline-checkout-local"] = true;
        checkoutLocal.default(PluginManager.plugins);

        PluginManager.pluginModules["jobline-checkout-git"] = true;
        checkoutGit.default(PluginManager.plugins);

        PluginManager.pluginModules["jobline-report-file"] = true;
        reportFile.default(PluginManager.plugins);

        PluginManager.pluginModules["jobline-report-command"] = true;
        reportCommand.default(PluginManager.plugins);
    }

    /**
     * Loads the given plugin modules from node_modules and lets each one register its plugins. Modules that were
     * already loaded are skipped.
     */
    static requirePlugins(moduleNames: ReadonlyArray<string>, callback: async.ErrorCallback<Error>): void {
        for (const moduleName of moduleNames) {
            if (PluginManager.pluginModules[moduleName]) {
                // already loaded, don't do anything
                continue;
            }

            let pluginModule: unknown;
            try {
                pluginModule = require(moduleName);
            } catch (e) {
                callback(new ConfigError("Cannot find plugin " + moduleName +
                    ". Are you sure you have added it to the package.json file?\n" + ErrorUtil.toError(e).message));
                return;
            }

            const index: IPluginIndex | undefined = PluginManager.findIndex(pluginModule);
            if (!index) {
                callback(new ConfigError("Can't figure out how to load plugin " + moduleName +
                    ". The plugin should export a default function that accepts the plugin registry. " +
                    "See documentation for more details."));
                return;
            }

            try {
                index(PluginManager.plugins);
            } catch (e) {
                callback(ErrorUtil.customize(ErrorUtil.toError(e), "The plugin " + moduleName + " failed to load."));
                return;
            }

            PluginManager.pluginModules[moduleName] = true;
        }

        callback(null);
    }

    private static findIndex(pluginModule: unknown): IPluginIndex | undefined {
        if (_.isFunction(pluginModule)) {
            return (registry: IPluginRegistry) => pluginModule(registry);
        }

        for (const key of ["default", "main"]) {
            const candidate: unknown = _.isObject(pluginModule) ? Reflect.get(pluginModule, key) : undefined;
            if (_.isFunction(candidate)) {
                return (registry: IPluginRegistry) => candidate(registry);
            }
        }

        return undefined;
    }
}
