/**
 * Application Constants and Defaults
 */

/** Mount path where the remote executor relocates staged files */
export const COMMAND_FILES_MOUNT = '/command-files';

export const DEFAULT_CHART = {
  archiveUrl: 'https://github.com/supabase-community/supabase-kubernetes/archive/refs/heads/main.zip',
  rootPrefix: 'supabase-kubernetes-',
  chartPath: 'charts/supabase',
  packagePrefix: 'supabase-',
} as const;

export const DEFAULT_DEPLOY = {
  namespace: 'supabase',
  release: 'supabase',
  installTimeout: '15m',
} as const;

export const ADDONS = {
  externalSecrets: {
    repoName: 'external-secrets',
    repoUrl: 'https://charts.external-secrets.io',
    release: 'external-secrets',
    chart: 'external-secrets/external-secrets',
    namespace: 'external-secrets',
    timeout: '10m',
  },
  ingressNginx: {
    repoName: 'ingress-nginx',
    repoUrl: 'https://kubernetes.github.io/ingress-nginx',
    release: 'ingress-nginx',
    chart: 'ingress-nginx/ingress-nginx',
    namespace: 'ingress-nginx',
    service: 'ingress-nginx-controller',
    replicaCount: 2,
    internalAnnotation: 'service.beta.kubernetes.io/azure-load-balancer-internal=true',
  },
} as const;

/**
 * Readiness wait for the ingress controller service
 */
export const INGRESS_READINESS = {
  attempts: 30,
  intervalSeconds: 2,
} as const;

/**
 * Manifests applied before the chart install, relative to the manifest directory
 */
export const BASELINE_MANIFESTS = [
  'k8s/eso/secretstore.yaml',
  'k8s/eso/externalsecret.yaml',
  'k8s/eso/storage-externalsecret.yaml',
  'k8s/eso/azure-storage-externalsecret.yaml',
  'k8s/s3proxy/deployment.yaml',
] as const;

/**
 * Applied by cluster configuration when present
 */
export const CONFIGURE_MANIFESTS = [
  'k8s/eso/secretstore.yaml',
  'k8s/eso/externalsecret.yaml',
  'k8s/eso/storage-externalsecret.yaml',
  'k8s/eso/azure-storage-externalsecret.yaml',
  'k8s/eso/db-externalsecret.yaml',
  'k8s/s3proxy/deployment.yaml',
] as const;

export const POLICY_MANIFESTS = [
  'k8s/hpa/postgrest-hpa.yaml',
  'k8s/hpa/realtime-hpa.yaml',
  'k8s/networkpolicy/supabase-networkpolicy.yaml',
] as const;

export const SECRET_NAMES = {
  jwtSecret: 'jwt-secret',
  anonKey: 'anon-key',
  serviceRoleKey: 'service-role-key',
  postgresConnectionString: 'postgres-connection-string',
  storageProxyCredentials: 'supabase-storage-creds',
  storageAccountName: 'azure-storage-account-name',
  storageAccountKey: 'azure-storage-account-key',
  storageConnectionString: 'storage-connection-string',
} as const;

export const VAULT_READER_ROLE = 'Key Vault Secrets User';

export const DIAGNOSTICS = {
  maxPods: 10,
  eventTail: 20,
} as const;

export const SMOKE_TEST = {
  timeoutMs: 10000,
  path: '/rest/v1/',
} as const;

export const CDKTF = {
  executable: 'cdktf',
  defaultProjectDir: 'infra',
} as const;
