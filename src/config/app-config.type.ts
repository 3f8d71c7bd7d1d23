export type AppConfig = {
  nodeEnv: string;
  name: string;
  port: number;
  corsOrigin: string;
  swaggerEnabled: boolean;
};
