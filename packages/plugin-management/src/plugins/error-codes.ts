/**
 * Plugin location, properties and installation error codes
 */
export enum PluginErrorCode {
    // Location errors
    NOT_INSTALLED = 'plugin_not_installed',
    NO_VALID_VERSIONS = 'plugin_no_valid_versions',
    INVALID_NAME = 'plugin_invalid_name',

    // Properties errors
    PROPERTIES_READ_FAILED = 'plugin_properties_read_failed',
    PROPERTIES_INVALID = 'plugin_properties_invalid',

    // Installation errors
    NO_INSTALL_ROOT = 'plugin_no_install_root',
}
