/**
 * Filesystem loader error codes
 */
export enum LoaderErrorCode {
    // Construction
    INVALID_ROOT = 'loader_invalid_root',
    INVALID_OPTIONS = 'loader_invalid_options',

    // Traversal
    ROOT_NOT_FOUND = 'loader_root_not_found',
    ROOT_NOT_DIRECTORY = 'loader_root_not_directory',
    PERMISSION_DENIED = 'loader_permission_denied',
    TRAVERSAL_FAILED = 'loader_traversal_failed',

    // Per item
    ITEM_MATERIALIZATION_FAILED = 'loader_item_materialization_failed',
}
