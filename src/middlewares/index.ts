/**
 * Motivación: exponer los middlewares registrados en el cliente.
 *
 * Alcance: validación previa y control de flujo; no ejecuta la lógica de los comandos ni persiste datos.
 */
import { moderationGuard } from "./guards/middleware";

export const middlewares = {
  moderationGuard,
};
