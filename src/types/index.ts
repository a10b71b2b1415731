export * from './k8s';
export * from './resources';
export * from './report';
