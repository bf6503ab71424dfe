/**
 * Contrato del backend de persistencia de tareas.
 *
 * Las implementaciones pueden lanzar ante fallos de infraestructura; es
 * `AlmacenTareas` quien los convierte en resultados.
 */
import type { CamposActualizacionTarea, EstadoTarea, Tarea } from '../../compartido/tipos/dominio';

export type FiltroTareas = {
  estado?: EstadoTarea;
  limite?: number;
};

export type CamposPersistidos = CamposActualizacionTarea & Pick<Tarea, 'actualizado_en'>;

export interface RepositorioTareas {
  obtener(id: string): Promise<Tarea | null>;
  insertar(tarea: Tarea): Promise<Tarea>;
  /** Escritura parcial; devuelve el registro completo tras actualizar o `null` si no existe. */
  actualizarCampos(id: string, campos: CamposPersistidos): Promise<Tarea | null>;
  /** Idempotente: eliminar un id inexistente no es error. */
  eliminar(id: string): Promise<void>;
  /** Recorrido completo con filtro de igualdad opcional; sin orden garantizado. */
  escanear(filtro: FiltroTareas): Promise<Tarea[]>;
}
