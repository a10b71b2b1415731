import * as k8s from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import { FatalConfigurationError } from '../utils/errors';

// The API surface the data source uses. Narrow on purpose, so tests can hand in fakes.
export interface KubeClients {
  contextName: string;
  coreApi: Pick<
    k8s.CoreV1Api,
    'listNamespace' | 'readNamespace' | 'listNamespacedPod' | 'listPodForAllNamespaces' | 'listNode'
  >;
  appsApi: Pick<k8s.AppsV1Api, 'listNamespacedDeployment' | 'listNamespacedStatefulSet' | 'listNamespacedDaemonSet'>;
  customObjectsApi: Pick<k8s.CustomObjectsApi, 'listNamespacedCustomObject'>;
  versionApi: Pick<k8s.VersionApi, 'getCode'>;
  metricsClient: Pick<k8s.Metrics, 'getPodMetrics' | 'getNodeMetrics'>;
}

export function loadKubeConfig(context?: string): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  try {
    kc.loadFromDefault();
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger().error(`Failed to load Kubernetes configuration: ${message}`);
    throw new FatalConfigurationError(`Kubernetes configuration error: ${message}`, { cause: error });
  }

  if (context) {
    const available = kc.getContexts().map(c => c.name);
    if (!available.includes(context)) {
      throw new FatalConfigurationError(`Context "${context}" not found. Available contexts: ${available.join(', ')}`);
    }
    kc.setCurrentContext(context);
  }

  getLogger().info(`K8s context loaded: ${kc.getCurrentContext()}`);
  return kc;
}

export function createKubeClients(context?: string): KubeClients {
  const kc = loadKubeConfig(context);
  return {
    contextName: kc.getCurrentContext(),
    coreApi: kc.makeApiClient(k8s.CoreV1Api),
    appsApi: kc.makeApiClient(k8s.AppsV1Api),
    customObjectsApi: kc.makeApiClient(k8s.CustomObjectsApi),
    versionApi: kc.makeApiClient(k8s.VersionApi),
    metricsClient: new k8s.Metrics(kc)
  };
}
