import { DepotRuntimeError, ErrorScope, ErrorType } from '@plugin-depot/core';
import { PluginErrorCode } from './error-codes.js';

/**
 * Plugin error factory methods
 */
export class PluginError {
    // Location errors
    static notInstalled(pluginName: string, triedRoots: string[]) {
        return new DepotRuntimeError(
            PluginErrorCode.NOT_INSTALLED,
            ErrorScope.PLUGIN,
            ErrorType.NOT_FOUND,
            `Plugin '${pluginName}' is not installed (searched: ${triedRoots.join(', ') || 'no roots'})`,
            { pluginName, triedRoots },
            `Install the plugin first, e.g. \`install ${pluginName}\``
        );
    }

    static noValidVersions(pluginName: string, root: string) {
        return new DepotRuntimeError(
            PluginErrorCode.NO_VALID_VERSIONS,
            ErrorScope.PLUGIN,
            ErrorType.NOT_FOUND,
            `No valid versions found for plugin '${pluginName}' in ${root}`,
            { pluginName, root },
            'Version directories must be named major.minor.patch; reinstall the plugin'
        );
    }

    static invalidName(pluginName: string) {
        return new DepotRuntimeError(
            PluginErrorCode.INVALID_NAME,
            ErrorScope.PLUGIN,
            ErrorType.USER,
            `Invalid plugin name: '${pluginName}'`,
            { pluginName },
            'Plugin names must be a single, non-empty path segment'
        );
    }

    // Properties errors
    static propertiesReadFailed(propertiesPath: string, cause: string) {
        return new DepotRuntimeError(
            PluginErrorCode.PROPERTIES_READ_FAILED,
            ErrorScope.PLUGIN,
            ErrorType.SYSTEM,
            `Could not read ${propertiesPath}: ${cause}`,
            { propertiesPath, cause },
            'Check that the plugin properties file exists and is readable'
        );
    }

    static propertiesInvalid(propertiesPath: string, cause: string) {
        return new DepotRuntimeError(
            PluginErrorCode.PROPERTIES_INVALID,
            ErrorScope.PLUGIN,
            ErrorType.USER,
            `Invalid plugin properties in ${propertiesPath}: ${cause}`,
            { propertiesPath, cause },
            'The properties file must be a JSON object with a "version" string'
        );
    }

    // Installation errors
    static noInstallRoot(pluginName: string) {
        return new DepotRuntimeError(
            PluginErrorCode.NO_INSTALL_ROOT,
            ErrorScope.PLUGIN,
            ErrorType.USER,
            `Cannot install '${pluginName}': no plugin roots are configured`,
            { pluginName },
            'Set pluginRoots in plugin-depot.yml or PLUGIN_DEPOT_PLUGIN_ROOTS'
        );
    }
}
