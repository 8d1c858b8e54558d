/**
 * Application Constants
 */

// Graph API
export const GRAPH_API = {
  BASE_URL: 'https://graph.microsoft.com/v1.0',
  DIRECTORY_OBJECTS_URL: 'https://graph.microsoft.com/v1.0/directoryObjects',
  SCOPES: ['https://graph.microsoft.com/.default'],
  SERVICE_PRINCIPAL_NAME: 'Microsoft Graph',
};

// Exchange Online admin API (the REST surface behind the EXO cmdlets)
export const EXCHANGE_API = {
  BASE_URL: 'https://outlook.office365.com/adminapi/beta',
  SCOPES: ['https://outlook.office365.com/.default'],
};

export const LOGIN_BASE_URL = 'https://login.microsoftonline.com';

// Well-known resource application ids
export const RESOURCE_APPS = {
  GRAPH: '00000003-0000-0000-c000-000000000000',
  SHAREPOINT: '00000003-0000-0ff1-ce00-000000000000',
  EXCHANGE: '00000002-0000-0ff1-ce00-000000000000',
};

// Fixed resource blocks appended for the 365Audit scenario
export const SHAREPOINT_AUDIT_PERMISSIONS = [
  { id: 'd13f72ca-a275-4b96-b789-48ebcc4da984', name: 'Sites.Read.All' },
  { id: '678536fe-1083-478a-9c59-b99265e6b0d3', name: 'Sites.FullControl.All' },
];

export const EXCHANGE_AUDIT_PERMISSIONS = [
  { id: 'dc50a0fb-09a3-484d-be87-e023b12c6440', name: 'Exchange.ManageAsApp' },
];

// Resource blocks a single app registration may carry (Graph, SharePoint, Exchange)
export const MAX_RESOURCE_BLOCKS = 3;

export const DIRECTORY_ROLES = {
  EXCHANGE_ADMINISTRATOR: '29232cdf-9323-42fd-ade2-1d097af3e4de',
  GLOBAL_READER: 'f2ef992c-3afb-46b9-b7cf-a126ee74c451',
};

// Application permissions requested per scenario
export const EMAIL_APP_PERMISSIONS = ['Mail.Send'];

export const AUDIT_APP_PERMISSIONS = [
  'AuditLog.Read.All',
  'Directory.Read.All',
  'Group.Read.All',
  'Organization.Read.All',
  'Policy.Read.All',
  'Reports.Read.All',
  'RoleManagement.Read.Directory',
  'SecurityEvents.Read.All',
  'Sites.Read.All',
  'User.Read.All',
];

export const MEM_APP_PERMISSIONS = {
  READ_WRITE: [
    'DeviceManagementApps.ReadWrite.All',
    'DeviceManagementConfiguration.ReadWrite.All',
    'DeviceManagementManagedDevices.ReadWrite.All',
    'DeviceManagementServiceConfig.ReadWrite.All',
    'Group.ReadWrite.All',
  ],
  READ_ONLY: [
    'DeviceManagementApps.Read.All',
    'DeviceManagementConfiguration.Read.All',
    'DeviceManagementManagedDevices.Read.All',
    'DeviceManagementServiceConfig.Read.All',
    'Group.Read.All',
  ],
};

// Delegated scopes the operator session needs for each workflow
export const SESSION_SCOPES = {
  APP_MANAGEMENT: [
    'Application.ReadWrite.All',
    'DelegatedPermissionGrant.ReadWrite.All',
    'Directory.ReadWrite.All',
  ],
  ROLE_MANAGEMENT: ['RoleManagement.ReadWrite.Directory'],
  USER_READ: ['User.Read.All'],
};

export const APP_NAMING = {
  BASE: 'GraphToolKit',
  FALLBACK_DOMAIN: 'MyDomain',
  DOMAIN_ENV_VAR: 'USERDNSDOMAIN',
};

// Delegated sign-in
export const AUTH = {
  // Microsoft Graph Command Line Tools
  GRAPH_CLIENT_ID: process.env.GRAPHTK_CLIENT_ID || '14d82eec-204b-4c2f-b7e8-296a70dab67e',
  // Exchange Online PowerShell
  EXCHANGE_CLIENT_ID: process.env.GRAPHTK_EXO_CLIENT_ID || 'fb78d390-0c51-40cd-8e17-fdbfab77341b',
  AUTHORITY_TENANT: process.env.GRAPHTK_AUTHORITY_TENANT || 'organizations',
};

export const DEFAULTS = {
  VAULT_NAME: 'GraphEmailAppLocalStore',
  KEY_EXPORT_POLICY: 'NonExportable' as const,
  STORE_LOCATION: 'CurrentUser' as const,
  SIGN_IN_AUDIENCE: 'AzureADMyOrg',
  GRANT_DELAY_MS: 2000,
  CERT_VALIDITY_DAYS: 365,
  CERT_KEY_BITS: 2048,
};

// Application paths
export const PATHS = {
  DATA_DIR: process.env.GRAPHTK_DATA_DIR || '.graphtoolkit/data',
  CERT_DIR: process.env.GRAPHTK_CERT_DIR || '.graphtoolkit/certs',
  LOG_DIR: process.env.GRAPHTK_LOG_DIR || '.graphtoolkit/logs',
  VAULT_FILE: 'vault.db',
  MSAL_CACHE_FILE: 'msal-cache.json',
};
