/**
 * Resource Groups: Type Definitions
 */

export type ResourceGroup = {
  id: string;
  name: string;
  location: string;
  tags?: Record<string, string>;
  provisioningState?: string;
};
