export interface Confirmer {
  confirm(question: string): Promise<boolean>;
}
