// Pruebas del servicio de escritura con reloj e ids deterministas.
import { describe, expect, it } from 'vitest';
import { crearAlmacenTareas } from '../src/modulos/modulo_tareas/almacenTareas';
import { crearRepositorioTareasMemoria } from '../src/modulos/modulo_tareas/repositorioTareasMemoria';
import type { RepositorioTareas } from '../src/modulos/modulo_tareas/repositorioTareas';
import { crearServicioTareas } from '../src/modulos/modulo_tareas/servicioTareas';
import { MENSAJES } from '../src/modulos/modulo_tareas/validacionesTareas';
import { crearRelojPrueba } from './utils/reloj';
import { falloDe, mensajeDe, valorDe } from './utils/resultados';
import { ID_INEXISTENTE, ID_TAREA, crearRepositorioConFallas, tareaDePrueba } from './utils/tareas';

function crearEscenario(repositorio: RepositorioTareas = crearRepositorioTareasMemoria()) {
  const { reloj, avanzar } = crearRelojPrueba('2025-06-01T10:00:00Z');
  const almacen = crearAlmacenTareas(repositorio);
  const servicio = crearServicioTareas({ almacen, reloj, generarId: () => ID_TAREA });
  return { servicio, almacen, avanzar };
}

describe('servicio de tareas', () => {
  it('crea una tarea con id y marcas de tiempo asignadas', async () => {
    const { servicio, almacen } = crearEscenario();

    const creada = valorDe(await servicio.crear({ titulo: 'Buy milk', id: 'ignorado', creado_en: '1999-01-01' }));

    expect(creada).toEqual({
      id: ID_TAREA,
      titulo: 'Buy milk',
      descripcion: '',
      fecha: '2025-06-01T10:00:00Z',
      estado: 'PENDIENTE',
      creado_en: '2025-06-01T10:00:00Z',
      actualizado_en: '2025-06-01T10:00:00Z'
    });
    expect(valorDe(await almacen.obtener(ID_TAREA))).toEqual(creada);
  });

  it('no persiste nada si la validacion falla', async () => {
    const { servicio, almacen } = crearEscenario();

    expect(mensajeDe(await servicio.crear({ titulo: '' }))).toBe(MENSAJES.tituloObligatorio);
    expect(valorDe(await almacen.escanear())).toEqual([]);
  });

  it('actualiza campos y avanza actualizado_en sin tocar creado_en', async () => {
    const { servicio, avanzar } = crearEscenario();
    await servicio.crear({ titulo: 'Buy milk' });
    avanzar(90_000);

    const actualizada = valorDe(await servicio.actualizar(ID_TAREA, { estado: 'COMPLETADA' }));

    expect(actualizada.estado).toBe('COMPLETADA');
    expect(actualizada.titulo).toBe('Buy milk');
    expect(actualizada.creado_en).toBe('2025-06-01T10:00:00Z');
    expect(actualizada.actualizado_en).toBe('2025-06-01T10:01:30Z');
  });

  it('verifica existencia antes de validar al actualizar', async () => {
    const { servicio } = crearEscenario();

    expect(falloDe(await servicio.actualizar(ID_INEXISTENTE, {}))).toEqual({ tipo: 'NO_ENCONTRADO', id: ID_INEXISTENTE });
  });

  it('rechaza actualizaciones sin campos reconocidos y no cambia la tarea', async () => {
    const { servicio, almacen } = crearEscenario(crearRepositorioTareasMemoria([tareaDePrueba()]));

    expect(mensajeDe(await servicio.actualizar(ID_TAREA, { prioridad: 'alta' }))).toBe(MENSAJES.sinCampos);
    expect(valorDe(await almacen.obtener(ID_TAREA))).toEqual(tareaDePrueba());
  });

  it('reporta NO_ENCONTRADO si la tarea desaparece antes de escribir', async () => {
    const base = crearRepositorioTareasMemoria([tareaDePrueba()]);
    const repositorio: RepositorioTareas = { ...base, actualizarCampos: async () => null };
    const { servicio } = crearEscenario(repositorio);

    expect(falloDe(await servicio.actualizar(ID_TAREA, { titulo: 'X' }))).toEqual({ tipo: 'NO_ENCONTRADO', id: ID_TAREA });
  });

  it('elimina una tarea existente y devuelve su id', async () => {
    const { servicio, almacen } = crearEscenario(crearRepositorioTareasMemoria([tareaDePrueba()]));

    expect(valorDe(await servicio.eliminar(ID_TAREA))).toBe(ID_TAREA);
    expect(valorDe(await almacen.obtener(ID_TAREA))).toBeNull();
    expect(falloDe(await servicio.eliminar(ID_TAREA))).toEqual({ tipo: 'NO_ENCONTRADO', id: ID_TAREA });
  });

  it('propaga fallos del almacen', async () => {
    const { servicio } = crearEscenario(crearRepositorioConFallas(new Error('caido')));

    expect(falloDe(await servicio.crear({ titulo: 'A' })).tipo).toBe('ALMACEN');
    expect(falloDe(await servicio.actualizar(ID_TAREA, { titulo: 'B' })).tipo).toBe('ALMACEN');
    expect(falloDe(await servicio.eliminar(ID_TAREA)).tipo).toBe('ALMACEN');
  });
});
