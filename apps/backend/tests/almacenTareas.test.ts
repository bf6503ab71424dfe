// Pruebas del almacen de tareas sobre el repositorio en memoria.
import { describe, expect, it } from 'vitest';
import { crearAlmacenTareas } from '../src/modulos/modulo_tareas/almacenTareas';
import { crearRepositorioTareasMemoria } from '../src/modulos/modulo_tareas/repositorioTareasMemoria';
import { ID_INEXISTENTE, ID_TAREA, crearRepositorioConFallas, tareaDePrueba } from './utils/tareas';
import { falloDe, valorDe } from './utils/resultados';

describe('almacen de tareas', () => {
  it('inserta y recupera una tarea por id', async () => {
    const almacen = crearAlmacenTareas(crearRepositorioTareasMemoria());
    const tarea = tareaDePrueba();

    expect(valorDe(await almacen.insertar(tarea))).toEqual(tarea);
    expect(valorDe(await almacen.obtener(ID_TAREA))).toEqual(tarea);
  });

  it('devuelve null (no un fallo) para un id inexistente', async () => {
    const almacen = crearAlmacenTareas(crearRepositorioTareasMemoria());
    expect(valorDe(await almacen.obtener(ID_INEXISTENTE))).toBeNull();
  });

  it('fusiona solo los campos dados y fija actualizado_en', async () => {
    const almacen = crearAlmacenTareas(crearRepositorioTareasMemoria([tareaDePrueba()]));

    const actualizada = valorDe(await almacen.fusionar(ID_TAREA, { estado: 'COMPLETADA' }, '2025-06-02T08:00:00Z'));

    expect(actualizada).toEqual(tareaDePrueba({ estado: 'COMPLETADA', actualizado_en: '2025-06-02T08:00:00Z' }));
    expect(valorDe(await almacen.obtener(ID_TAREA))).toEqual(actualizada);
  });

  it('fusionar sobre un id inexistente devuelve null', async () => {
    const almacen = crearAlmacenTareas(crearRepositorioTareasMemoria());
    expect(valorDe(await almacen.fusionar(ID_INEXISTENTE, { titulo: 'X' }, '2025-06-02T08:00:00Z'))).toBeNull();
  });

  it('eliminar es idempotente', async () => {
    const almacen = crearAlmacenTareas(crearRepositorioTareasMemoria([tareaDePrueba()]));

    expect((await almacen.eliminar(ID_TAREA)).ok).toBe(true);
    expect((await almacen.eliminar(ID_TAREA)).ok).toBe(true);
    expect(valorDe(await almacen.obtener(ID_TAREA))).toBeNull();
  });

  it('escanea con filtro de estado y limite', async () => {
    const almacen = crearAlmacenTareas(
      crearRepositorioTareasMemoria([
        tareaDePrueba({ id: 'a', estado: 'PENDIENTE' }),
        tareaDePrueba({ id: 'b', estado: 'COMPLETADA' }),
        tareaDePrueba({ id: 'c', estado: 'PENDIENTE' })
      ])
    );

    expect(valorDe(await almacen.escanear())).toHaveLength(3);
    const pendientes = valorDe(await almacen.escanear({ estado: 'PENDIENTE' }));
    expect(pendientes.map((tarea) => tarea.id).sort()).toEqual(['a', 'c']);
    expect(valorDe(await almacen.escanear({ estado: 'PENDIENTE', limite: 1 }))).toHaveLength(1);
    expect(valorDe(await almacen.escanear({ estado: 'CANCELADA' }))).toEqual([]);
  });

  it('no expone el estado interno por referencia', async () => {
    const almacen = crearAlmacenTareas(crearRepositorioTareasMemoria([tareaDePrueba()]));

    const leida = valorDe(await almacen.obtener(ID_TAREA));
    if (leida) leida.titulo = 'Mutada';

    expect(valorDe(await almacen.obtener(ID_TAREA))?.titulo).toBe('Preparar informe');
  });

  it('convierte cualquier fallo del backend en ALMACEN sin lanzar', async () => {
    const causa = new Error('sin conexion');
    const almacen = crearAlmacenTareas(crearRepositorioConFallas(causa));

    expect(falloDe(await almacen.obtener(ID_TAREA))).toEqual({ tipo: 'ALMACEN', causa });
    expect(falloDe(await almacen.insertar(tareaDePrueba()))).toEqual({ tipo: 'ALMACEN', causa });
    expect(falloDe(await almacen.fusionar(ID_TAREA, { titulo: 'X' }, '2025-06-02T08:00:00Z')).tipo).toBe('ALMACEN');
    expect(falloDe(await almacen.eliminar(ID_TAREA)).tipo).toBe('ALMACEN');
    expect(falloDe(await almacen.escanear({ estado: 'PENDIENTE' })).tipo).toBe('ALMACEN');
  });
});
