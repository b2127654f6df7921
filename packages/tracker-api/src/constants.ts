// Environment variables consumed by the default connection accessor
export const SERVER_URL_ENV_KEY = 'TRACKER_SERVER_URL';
export const SERVER_API_KEY_ENV_KEY = 'TRACKER_API_KEY';
export const SERVER_TIMEOUT_ENV_KEY = 'TRACKER_SERVER_TIMEOUT';
export const SERVER_RETRIES_ENV_KEY = 'TRACKER_SERVER_RETRIES';
export const SITE_ID_ENV_KEY = 'TRACKER_SITE_ID';

export const MIN_SERVER_VERSION = '1.0.0';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 100;
export const DEFAULT_MAX_DELAY_MS = 2_000;

// Page size of paginated GraphQL queries
export const GRAPHQL_PAGE_SIZE = 300;

// Statuses carry an entity type scope from this server version on
export const STATUS_SCOPE_MIN_VERSION = '1.5.0';

const COMMON_ENTITY_FIELDS = ['id', 'name', 'status', 'tags', 'active', 'allAttrib', 'data'];

export const DEFAULT_FOLDER_FIELDS = [...COMMON_ENTITY_FIELDS, 'label', 'folderType', 'parentId', 'path', 'hasProducts'];
export const DEFAULT_TASK_FIELDS = [...COMMON_ENTITY_FIELDS, 'label', 'taskType', 'folderId', 'assignees'];
export const DEFAULT_PRODUCT_FIELDS = [...COMMON_ENTITY_FIELDS, 'productType', 'folderId'];
export const DEFAULT_VERSION_FIELDS = [...COMMON_ENTITY_FIELDS, 'version', 'productId', 'taskId'];
export const DEFAULT_REPRESENTATION_FIELDS = [...COMMON_ENTITY_FIELDS, 'versionId'];
